/**
 * @ledgerwork/cli shell completion generators.
 *
 * Each generator produces a self-contained script that can be sourced or
 * written to the shell's completions directory.
 *
 * @packageDocumentation
 */

import { assertNever } from '@ledgerwork/types';

// ─── Command table ────────────────────────────────────────────────────────────

interface CommandCompletion {
  name: string;
  description: string;
  /** Flags specific to the command, in addition to the global ones. */
  flags: readonly string[];
  /** Fixed words accepted as the first positional argument. */
  words: readonly string[];
}

export const SHELLS = ['bash', 'zsh', 'fish'] as const;
export type Shell = (typeof SHELLS)[number];

const GLOBAL_FLAGS = [
  '--difficulty',
  '--replicas',
  '--blocks',
  '--genesis',
  '--config',
  '--json',
  '--no-color',
  '--verbose',
  '--help',
] as const;

const COMMANDS: readonly CommandCompletion[] = [
  { name: 'simulate', description: 'Build identical replicas and compare roots', flags: [], words: [] },
  { name: 'attack', description: 'Run an attack scenario', flags: [], words: ['minority', 'majority'] },
  {
    name: 'tamper',
    description: 'Edit a block of one replica',
    flags: ['--replica', '--index', '--payload', '--remine'],
    words: [],
  },
  {
    name: 'compare',
    description: 'Diff two replicas block by block',
    flags: ['--index', '--payload', '--remine'],
    words: [],
  },
  { name: 'merkle', description: 'Print a Merkle tree and proofs', flags: ['--proof'], words: [] },
  {
    name: 'mine',
    description: 'Mine a single block',
    flags: ['--prev', '--timestamp', '--max-iterations'],
    words: [],
  },
  { name: 'completions', description: 'Generate a shell completion script', flags: [], words: SHELLS },
  { name: 'version', description: 'Print version information', flags: [], words: [] },
  { name: 'help', description: 'Show help message', flags: [], words: [] },
];

export function isShell(value: string | undefined): value is Shell {
  return SHELLS.some((shell) => shell === value);
}

// ─── Bash ─────────────────────────────────────────────────────────────────────

/**
 * Bash completion script registering `_ledgerwork_completions`.
 *
 * @example
 * ```bash
 * ledgerwork completions bash > /etc/bash_completion.d/ledgerwork
 * ```
 */
export function bashCompletions(): string {
  const cases = COMMANDS.map((command) => {
    const candidates = [...command.words, ...command.flags, ...GLOBAL_FLAGS].join(' ');
    return `        ${command.name})\n            COMPREPLY=( $(compgen -W "${candidates}" -- "\${cur}") )\n            ;;`;
  }).join('\n');

  return `# Bash completion for ledgerwork
# Source this file or copy to /etc/bash_completion.d/ledgerwork

_ledgerwork_completions() {
    local cur
    COMPREPLY=()
    cur="\${COMP_WORDS[COMP_CWORD]}"

    if [[ \${COMP_CWORD} -eq 1 ]]; then
        COMPREPLY=( $(compgen -W "${COMMANDS.map((c) => c.name).join(' ')}" -- "\${cur}") )
        return 0
    fi

    case "\${COMP_WORDS[1]}" in
${cases}
    esac
    return 0
}

complete -F _ledgerwork_completions ledgerwork`;
}

// ─── Zsh ──────────────────────────────────────────────────────────────────────

/** Zsh completion script defining `_ledgerwork`. */
export function zshCompletions(): string {
  const described = COMMANDS.map((c) => `        '${c.name}:${c.description}'`).join('\n');
  const cases = COMMANDS.filter((c) => c.flags.length > 0 || c.words.length > 0)
    .map((command) => {
      const values = [...command.words, ...command.flags].join(' ');
      return `                ${command.name})\n                    _values '${command.name} option' ${values}\n                    ;;`;
    })
    .join('\n');

  return `#compdef ledgerwork
# Zsh completion for ledgerwork
# Copy to a directory in your $fpath (e.g. ~/.zsh/completions/_ledgerwork)

_ledgerwork() {
    local -a commands
    commands=(
${described}
    )

    _arguments -C \\
${GLOBAL_FLAGS.map((flag) => `        '${flag}' \\`).join('\n')}
        '1:command:->command' \\
        '*::arg:->args'

    case $state in
        command)
            _describe 'ledgerwork command' commands
            ;;
        args)
            case $words[1] in
${cases}
            esac
            ;;
    esac
}

_ledgerwork "$@"`;
}

// ─── Fish ─────────────────────────────────────────────────────────────────────

/** Fish completion script made of `complete -c ledgerwork` lines. */
export function fishCompletions(): string {
  const lines: string[] = ['# Fish completion for ledgerwork', 'complete -c ledgerwork -f'];

  for (const command of COMMANDS) {
    lines.push(`complete -c ledgerwork -n '__fish_use_subcommand' -a ${command.name} -d '${command.description}'`);
  }
  for (const flag of GLOBAL_FLAGS) {
    lines.push(`complete -c ledgerwork -l ${flag.slice(2)}`);
  }
  for (const command of COMMANDS) {
    const condition = `'__fish_seen_subcommand_from ${command.name}'`;
    if (command.words.length > 0) {
      lines.push(`complete -c ledgerwork -n ${condition} -a '${command.words.join(' ')}'`);
    }
    for (const flag of command.flags) {
      lines.push(`complete -c ledgerwork -n ${condition} -l ${flag.slice(2)}`);
    }
  }

  return lines.join('\n');
}

/** Completion script for `shell`. */
export function completions(shell: Shell): string {
  switch (shell) {
    case 'bash':
      return bashCompletions();
    case 'zsh':
      return zshCompletions();
    case 'fish':
      return fishCompletions();
    default:
      return assertNever(shell);
  }
}
