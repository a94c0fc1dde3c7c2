/**
 * @ledgerwork/cli — command line harness for replica scenarios.
 *
 * {@link run} takes the argument vector and returns the exit code and both
 * output streams, so commands can be tested without a process.
 *
 * @packageDocumentation
 */

import { Block, GENESIS_PREVIOUS_DIGEST, DEFAULT_DIFFICULTY, DEFAULT_GENESIS_TIMESTAMP } from '@ledgerwork/chain';
import type { Chain } from '@ledgerwork/chain';
import { difficultyTarget } from '@ledgerwork/crypto';
import { compareChains, compareRoots } from '@ledgerwork/consensus';
import type { RootComparison } from '@ledgerwork/consensus';
import { MerkleTree, verifyProof } from '@ledgerwork/merkle';
import {
  DEFAULT_BLOCKS,
  DEFAULT_REPLICAS,
  TAMPER_PAYLOAD,
  corruptBlock,
  majorityAttack,
  minorityAttack,
  rewriteHistory,
  simulateReplicas,
  tamperScenario,
} from '@ledgerwork/simulation';
import type { Scenario, ScenarioConfig } from '@ledgerwork/simulation';
import {
  LEDGERWORK_VERSION,
  LedgerError,
  LedgerErrorCode,
  Logger,
  LogLevel,
  createSilentLogger,
  formatError,
  isDigest,
  isLedgerError,
} from '@ledgerwork/types';

import { completions, isShell, SHELLS } from './completions';
import { loadConfig } from './config';
import {
  box,
  dim,
  error,
  getColorsEnabled,
  header,
  keyValue,
  setColorsEnabled,
  shortDigest,
  success,
  table,
  validityLabel,
  verdict,
  warning,
} from './format';

export { loadConfig, findConfigFile, validateConfig, CONFIG_FILE_NAME } from './config';
export type { LedgerworkConfig, OutputFormat } from './config';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Outcome of one CLI invocation. */
export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

/** Scenario parameters after merging flags, config file and defaults. */
interface Settings {
  difficulty: number;
  replicas: number;
  blocks: number;
  genesisTimestamp: number;
  json: boolean;
}

interface CommandContext {
  parsed: ParsedArgs;
  settings: Settings;
  logger: Logger;
  out: string[];
}

// ─── Minimal argument parser ──────────────────────────────────────────────────

/** Flags that never take a value. */
const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['json', 'no-color', 'verbose', 'remine', 'help']);

function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  let command = '';

  let i = 0;
  while (i < args.length) {
    const arg = args[i]!;

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i += 2;
      } else {
        flags[key] = true;
        i += 1;
      }
    } else if (command === '') {
      command = arg;
      i += 1;
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { command, positional, flags };
}

function getFlag(flags: Record<string, string | boolean>, key: string): string | undefined {
  const val = flags[key];
  if (val === undefined) return undefined;
  if (typeof val === 'boolean') {
    throw flagError(key, 'a value', val);
  }
  return val;
}

function integerFlag(flags: Record<string, string | boolean>, key: string): number | undefined {
  const val = flags[key];
  if (val === undefined) return undefined;
  if (typeof val === 'boolean' || !/^-?\d+$/.test(val)) {
    throw flagError(key, 'an integer', val);
  }
  return Number(val);
}

function numberFlag(flags: Record<string, string | boolean>, key: string): number | undefined {
  const val = flags[key];
  if (val === undefined) return undefined;
  const parsed = typeof val === 'string' ? Number(val) : Number.NaN;
  if (typeof val === 'boolean' || val.trim() === '' || !Number.isFinite(parsed)) {
    throw flagError(key, 'a number', val);
  }
  return parsed;
}

function flagError(key: string, expected: string, val: string | boolean): LedgerError {
  const got = typeof val === 'boolean' ? 'no value' : `"${val}"`;
  return new LedgerError(LedgerErrorCode.INVALID_INPUT, `--${key} expects ${expected}, got ${got}`);
}

function usageError(usage: string): LedgerError {
  return new LedgerError(LedgerErrorCode.INVALID_INPUT, `Usage: ${usage}`);
}

// ─── Settings ─────────────────────────────────────────────────────────────────

function resolveSettings(parsed: ParsedArgs, cwd?: string): Settings {
  const config = loadConfig(cwd, getFlag(parsed.flags, 'config'));
  return {
    difficulty: integerFlag(parsed.flags, 'difficulty') ?? config?.difficulty ?? DEFAULT_DIFFICULTY,
    replicas: integerFlag(parsed.flags, 'replicas') ?? config?.replicas ?? DEFAULT_REPLICAS,
    blocks: integerFlag(parsed.flags, 'blocks') ?? config?.blocks ?? DEFAULT_BLOCKS,
    genesisTimestamp: numberFlag(parsed.flags, 'genesis') ?? config?.genesisTimestamp ?? DEFAULT_GENESIS_TIMESTAMP,
    json: parsed.flags['json'] === true || config?.outputFormat === 'json',
  };
}

function scenarioConfig(ctx: CommandContext): ScenarioConfig {
  const { difficulty, replicas, blocks, genesisTimestamp } = ctx.settings;
  return { difficulty, replicas, blocks, genesisTimestamp, logger: ctx.logger };
}

function printJson(ctx: CommandContext, value: unknown): void {
  ctx.out.push(JSON.stringify(value, null, 2));
}

// ─── Replica report ───────────────────────────────────────────────────────────

function reportComparison(
  ctx: CommandContext,
  command: string,
  title: string,
  scenario: Scenario,
  comparison: RootComparison,
): void {
  const { settings } = ctx;
  const { replicas, altered } = scenario;

  if (settings.json) {
    printJson(ctx, {
      command,
      settings: {
        difficulty: settings.difficulty,
        replicas: settings.replicas,
        blocks: settings.blocks,
        genesisTimestamp: settings.genesisTimestamp,
      },
      majorityRoot: comparison.majorityRoot,
      majorityCount: comparison.majorityCount,
      accepted: comparison.accepted,
      rejected: comparison.rejected,
      altered,
      replicas: comparison.replicas.map((v) => ({
        index: v.index,
        length: replicas[v.index]!.length,
        root: v.root,
        validity: v.validity,
        matchesMajority: v.matchesMajority,
        accepted: v.accepted,
      })),
    });
    return;
  }

  const rows = comparison.replicas.map((v) => [
    altered.includes(v.index) ? `#${v.index} *` : `#${v.index}`,
    String(replicas[v.index]!.length),
    validityLabel(v.validity),
    shortDigest(v.root),
    verdict(v.accepted),
  ]);

  ctx.out.push(header(title));
  ctx.out.push('');
  ctx.out.push(
    keyValue([
      ['Replicas', String(replicas.length)],
      ['Difficulty', String(settings.difficulty)],
      ['Blocks', String(settings.blocks)],
      ['Genesis', String(settings.genesisTimestamp)],
    ]),
  );
  ctx.out.push('');
  ctx.out.push(table(['Replica', 'Length', 'Valid', 'Merkle root', 'Status'], rows));
  if (altered.length > 0) {
    ctx.out.push(dim('* altered by the scenario'));
  }
  ctx.out.push('');
  ctx.out.push(
    keyValue([
      ['Majority root', comparison.majorityRoot],
      ['Majority count', `${comparison.majorityCount}/${replicas.length}`],
    ]),
  );
  ctx.out.push('');
  if (comparison.rejected.length === 0) {
    ctx.out.push(success(`All ${replicas.length} replicas accepted`));
  } else {
    const list = comparison.rejected.map((i) => `#${i}`).join(', ');
    ctx.out.push(warning(`${comparison.rejected.length} of ${replicas.length} replicas rejected: ${list}`));
  }
}

// ─── Command: simulate ────────────────────────────────────────────────────────

function cmdSimulate(ctx: CommandContext): number {
  const replicas = simulateReplicas(scenarioConfig(ctx));
  const comparison = compareRoots(replicas, { logger: ctx.logger });
  reportComparison(ctx, 'simulate', 'Replica set', { replicas, altered: [] }, comparison);
  return 0;
}

// ─── Command: attack ──────────────────────────────────────────────────────────

function cmdAttack(ctx: CommandContext): number {
  const kind = ctx.parsed.positional[0];
  let scenario: Scenario;
  let title: string;
  if (kind === 'minority') {
    scenario = minorityAttack(scenarioConfig(ctx));
    title = 'Minority attack';
  } else if (kind === 'majority') {
    scenario = majorityAttack(scenarioConfig(ctx));
    title = 'Majority attack';
  } else {
    throw usageError('ledgerwork attack <minority|majority>');
  }
  const comparison = compareRoots(scenario.replicas, { logger: ctx.logger });
  reportComparison(ctx, `attack ${kind}`, title, scenario, comparison);
  return 0;
}

// ─── Command: tamper ──────────────────────────────────────────────────────────

function cmdTamper(ctx: CommandContext): number {
  const { flags } = ctx.parsed;
  const scenario = tamperScenario(scenarioConfig(ctx), {
    replica: integerFlag(flags, 'replica'),
    index: integerFlag(flags, 'index'),
    payload: getFlag(flags, 'payload'),
    remine: flags['remine'] === true,
  });
  const comparison = compareRoots(scenario.replicas, { logger: ctx.logger });
  reportComparison(ctx, 'tamper', 'Tampered replica', scenario, comparison);
  return 0;
}

// ─── Command: compare ─────────────────────────────────────────────────────────

function cmdCompare(ctx: CommandContext): number {
  const { flags } = ctx.parsed;
  const [a, b] = simulateReplicas({ ...scenarioConfig(ctx), replicas: 2 });
  const left: Chain = a!;
  const right: Chain = b!;

  const index = integerFlag(flags, 'index');
  if (index !== undefined) {
    const payload = getFlag(flags, 'payload') ?? TAMPER_PAYLOAD;
    if (flags['remine'] === true) {
      rewriteHistory(right, index, payload);
    } else {
      corruptBlock(right, index, payload);
    }
  }

  const diff = compareChains(left, right);
  const validityB = right.isValid();

  if (ctx.settings.json) {
    printJson(ctx, { command: 'compare', ...diff, validityA: left.isValid(), validityB });
  } else {
    ctx.out.push(header('Chain comparison'));
    ctx.out.push('');
    ctx.out.push(
      keyValue([
        ['Length A', String(diff.lengthA)],
        ['Length B', String(diff.lengthB)],
        ['Root A', diff.rootA],
        ['Root B', diff.rootB],
        ['Valid B', validityLabel(validityB)],
        ['Differing blocks', diff.differingIndices.length > 0 ? diff.differingIndices.join(', ') : 'none'],
        ['Length mismatch', diff.lengthMismatch ? 'yes' : 'no'],
      ]),
    );
    ctx.out.push('');
    ctx.out.push(diff.identical ? success('Chains are identical') : warning('Chains differ'));
  }
  return diff.identical ? 0 : 1;
}

// ─── Command: merkle ──────────────────────────────────────────────────────────

function cmdMerkle(ctx: CommandContext): number {
  const { positional, flags } = ctx.parsed;
  for (const leaf of positional) {
    if (!isDigest(leaf)) {
      throw new LedgerError(LedgerErrorCode.INVALID_INPUT, `Not a 64-character lowercase hex digest: "${leaf}"`, {
        hint: 'Pass block digests, or no leaves to use a simulated chain.',
      });
    }
  }

  const leaves =
    positional.length > 0 ? positional : simulateReplicas({ ...scenarioConfig(ctx), replicas: 1 })[0]!.digests();
  const tree = new MerkleTree(leaves);
  const root = tree.root();

  const proofIndex = integerFlag(flags, 'proof');
  const proof = proofIndex !== undefined ? tree.proof(proofIndex) : undefined;
  const proofValid =
    proof !== undefined && root !== undefined ? verifyProof(leaves[proof.index]!, proof, root) : undefined;

  if (ctx.settings.json) {
    printJson(ctx, {
      command: 'merkle',
      leafCount: tree.leafCount(),
      depth: tree.depth(),
      root: root ?? null,
      levels: tree.levels(),
      ...(proof !== undefined ? { proof, proofValid } : {}),
    });
    return 0;
  }

  ctx.out.push(header('Merkle tree'));
  ctx.out.push('');
  ctx.out.push(
    keyValue([
      ['Leaves', String(tree.leafCount())],
      ['Depth', String(tree.depth())],
      ['Root', root ?? '(empty)'],
    ]),
  );
  tree.levels().forEach((level, depth) => {
    ctx.out.push('');
    ctx.out.push(dim(`Level ${depth} (${level.length} ${level.length === 1 ? 'node' : 'nodes'})`));
    for (const node of level) {
      ctx.out.push(`  ${node}`);
    }
  });

  if (proof !== undefined) {
    ctx.out.push('');
    ctx.out.push(header(`Proof for leaf ${proof.index}`));
    ctx.out.push(table(['Step', 'Side', 'Sibling'], proof.path.map((step, i) => [String(i), step.side, step.sibling])));
    ctx.out.push(proofValid === true ? success('Proof verifies against the root') : warning('Proof does not verify'));
  }
  return 0;
}

// ─── Command: mine ────────────────────────────────────────────────────────────

function cmdMine(ctx: CommandContext): number {
  const { positional, flags } = ctx.parsed;
  const payload = positional[0];
  if (payload === undefined) {
    throw usageError('ledgerwork mine <payload> [--prev <digest>] [--timestamp <t>]');
  }
  const block = new Block(
    payload,
    getFlag(flags, 'prev') ?? GENESIS_PREVIOUS_DIGEST,
    numberFlag(flags, 'timestamp') ?? ctx.settings.genesisTimestamp,
  );
  const result = block.mine(ctx.settings.difficulty, { maxIterations: integerFlag(flags, 'max-iterations') });
  ctx.logger.debug('block mined', { nonce: result.nonce, iterations: result.iterations });

  if (ctx.settings.json) {
    printJson(ctx, {
      command: 'mine',
      ...block.toJSON(),
      difficulty: ctx.settings.difficulty,
      target: difficultyTarget(ctx.settings.difficulty),
      iterations: result.iterations,
    });
    return 0;
  }

  ctx.out.push(
    box(
      'Mined block',
      keyValue([
        ['Payload', block.payload],
        ['Previous', block.previousDigest],
        ['Timestamp', String(block.timestamp)],
        ['Difficulty', String(ctx.settings.difficulty)],
        ['Target', difficultyTarget(ctx.settings.difficulty)],
        ['Nonce', String(block.nonce)],
        ['Iterations', String(result.iterations)],
        ['Digest', block.digest],
      ]),
    ),
  );
  return 0;
}

// ─── Command: help ────────────────────────────────────────────────────────────

const COMMAND_HELP: Record<string, string[]> = {
  simulate: [
    'ledgerwork simulate [options]',
    '',
    'Build identical replicas and compare their Merkle roots.',
  ],
  attack: [
    'ledgerwork attack <minority|majority> [options]',
    '',
    'minority: replica #0 appends one block and is outvoted.',
    'majority: replica #0 appends two blocks and is copied over #1 and #2,',
    '          so the altered history wins the vote.',
  ],
  tamper: [
    'ledgerwork tamper [options]',
    '',
    'Edit one block of one replica and compare the set.',
    '  --replica <n>        Replica to edit (default: 0)',
    '  --index <n>          Block to edit (default: 2)',
    '  --payload <text>     Replacement payload',
    '  --remine             Re-mine the edited block and its descendants',
  ],
  compare: [
    'ledgerwork compare [options]',
    '',
    'Build two replicas, optionally edit the second, and diff them.',
    'Exits 1 when the chains differ.',
    '  --index <n>          Block of the second replica to edit',
    '  --payload <text>     Replacement payload',
    '  --remine             Re-mine after the edit',
  ],
  merkle: [
    'ledgerwork merkle [digest...] [--proof <n>]',
    '',
    'Print the Merkle tree over the given digests, or over a simulated chain.',
    '  --proof <n>          Also print the inclusion proof for leaf n',
  ],
  mine: [
    'ledgerwork mine <payload> [options]',
    '',
    'Mine a single block at the configured difficulty.',
    '  --prev <digest>      Previous digest (default: "0")',
    '  --timestamp <t>      Block timestamp (default: the genesis timestamp)',
    '  --max-iterations <n> Give up after n nonces',
  ],
  completions: [
    'ledgerwork completions <bash|zsh|fish>',
    '',
    'Print a shell completion script.',
  ],
  version: ['ledgerwork version', '', 'Print the version.'],
  help: ['ledgerwork help', '', 'Show this help message.'],
};

function cmdHelp(out: string[], command?: string): number {
  const specific = command !== undefined ? COMMAND_HELP[command] : undefined;
  if (specific !== undefined) {
    const [usage, ...rest] = specific;
    out.push(header(`Usage: ${usage ?? ''}`));
    out.push(...rest);
    return 0;
  }

  out.push(header('Ledgerwork CLI - proof-of-work ledger replicas'));
  out.push('');
  out.push('Usage: ledgerwork <command> [options]');
  out.push('');
  out.push('Commands:');
  out.push(
    table(
      ['Command', 'Description'],
      [
        ['simulate', 'Build identical replicas and compare roots'],
        ['attack <kind>', 'Run the minority or majority attack scenario'],
        ['tamper', 'Edit a block of one replica'],
        ['compare', 'Diff two replicas block by block'],
        ['merkle', 'Print a Merkle tree and inclusion proofs'],
        ['mine', 'Mine a single block'],
        ['completions <shell>', 'Print a bash, zsh or fish completion script'],
        ['version', 'Show version information'],
        ['help', 'Show this help message'],
      ],
    ),
  );
  out.push('');
  out.push('Options:');
  out.push('  --difficulty <n>     Leading zero hex digits per digest (default: 3)');
  out.push('  --replicas <n>       Number of replicas (default: 5)');
  out.push('  --blocks <n>         Blocks after genesis (default: 4)');
  out.push('  --genesis <t>        Genesis timestamp (default: 1000)');
  out.push('  --config <file>      Config file (default: nearest ledgerwork.config.json)');
  out.push('  --json               Print JSON');
  out.push('  --no-color           Disable colors');
  out.push('  --verbose            Log to stderr');
  return 0;
}

// ─── Command: completions ─────────────────────────────────────────────────────

function cmdCompletions(out: string[], shell: string | undefined): number {
  if (!isShell(shell)) {
    throw usageError(`ledgerwork completions <${SHELLS.join('|')}>`);
  }
  out.push(completions(shell));
  return 0;
}

// ─── Command: version ─────────────────────────────────────────────────────────

function cmdVersion(out: string[], json: boolean): number {
  out.push(json ? JSON.stringify({ version: LEDGERWORK_VERSION }) : LEDGERWORK_VERSION);
  return 0;
}

// ─── Entry point ──────────────────────────────────────────────────────────────

/**
 * Run the CLI with `args` (without the node and script paths).
 *
 * @param cwd - Directory the config file search starts from.
 */
export async function run(args: string[], cwd?: string): Promise<RunResult> {
  const parsed = parseArgs(args);
  const out: string[] = [];
  const err: string[] = [];

  const previousColors = getColorsEnabled();
  if (parsed.flags['no-color'] === true) {
    setColorsEnabled(false);
  }

  let exitCode: number;
  try {
    exitCode = dispatch(parsed, out, err, cwd);
  } catch (e) {
    if (isLedgerError(e)) {
      err.push(error(formatError(e)));
    } else {
      err.push(error(e instanceof Error ? e.message : String(e)));
    }
    exitCode = 1;
  } finally {
    setColorsEnabled(previousColors);
  }

  return { exitCode, stdout: out.join('\n'), stderr: err.join('\n') };
}

function dispatch(parsed: ParsedArgs, out: string[], err: string[], cwd?: string): number {
  if (parsed.command === '' || parsed.command === 'help') {
    return cmdHelp(out, parsed.positional[0]);
  }
  if (parsed.flags['help'] === true) {
    return cmdHelp(out, parsed.command);
  }
  if (parsed.command === 'version') {
    return cmdVersion(out, parsed.flags['json'] === true);
  }
  if (parsed.command === 'completions') {
    return cmdCompletions(out, parsed.positional[0]);
  }

  const logger =
    parsed.flags['verbose'] === true
      ? new Logger({
          level: LogLevel.DEBUG,
          component: 'cli',
          output: (entry) => {
            err.push(JSON.stringify(entry));
          },
        })
      : createSilentLogger('cli');

  const settings = resolveSettings(parsed, cwd);
  logger.debug('settings resolved', { command: parsed.command, ...settings });
  const ctx: CommandContext = { parsed, settings, logger, out };

  switch (parsed.command) {
    case 'simulate':
      return cmdSimulate(ctx);
    case 'attack':
      return cmdAttack(ctx);
    case 'tamper':
      return cmdTamper(ctx);
    case 'compare':
      return cmdCompare(ctx);
    case 'merkle':
      return cmdMerkle(ctx);
    case 'mine':
      return cmdMine(ctx);
    default:
      throw new LedgerError(LedgerErrorCode.INVALID_INPUT, `Unknown command: '${parsed.command}'`, {
        hint: "Run 'ledgerwork help' for usage.",
      });
  }
}
