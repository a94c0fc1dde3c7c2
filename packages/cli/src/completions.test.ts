import { describe, it, expect } from 'vitest';
import {
  SHELLS,
  bashCompletions,
  completions,
  fishCompletions,
  isShell,
  zshCompletions,
} from './completions';

const COMMAND_NAMES = ['simulate', 'attack', 'tamper', 'compare', 'merkle', 'mine', 'completions', 'version', 'help'];

describe('bashCompletions', () => {
  const script = bashCompletions();

  it('registers the completion function', () => {
    expect(script.split('\n')[0]).toBe('# Bash completion for ledgerwork');
    expect(script.endsWith('complete -F _ledgerwork_completions ledgerwork')).toBe(true);
  });

  it('offers every command at the first position', () => {
    expect(script).toContain(`compgen -W "${COMMAND_NAMES.join(' ')}"`);
  });

  it('offers attack kinds before the global flags', () => {
    expect(script).toContain('compgen -W "minority majority --difficulty');
  });

  it('offers tamper flags', () => {
    expect(script).toContain('compgen -W "--replica --index --payload --remine --difficulty');
  });
});

describe('zshCompletions', () => {
  const script = zshCompletions();

  it('starts with #compdef', () => {
    expect(script.split('\n')[0]).toBe('#compdef ledgerwork');
  });

  it('describes every command', () => {
    expect(script).toContain("'simulate:Build identical replicas and compare roots'");
    for (const name of COMMAND_NAMES) {
      expect(script).toContain(`'${name}:`);
    }
  });

  it('lists command values', () => {
    expect(script).toContain("_values 'attack option' minority majority");
    expect(script).toContain("_values 'merkle option' --proof");
  });
});

describe('fishCompletions', () => {
  const lines = fishCompletions().split('\n');

  it('adds one subcommand line per command', () => {
    expect(lines.filter((l) => l.includes('__fish_use_subcommand'))).toHaveLength(COMMAND_NAMES.length);
  });

  it('adds global and command flags', () => {
    expect(lines).toContain('complete -c ledgerwork -l no-color');
    expect(lines).toContain("complete -c ledgerwork -n '__fish_seen_subcommand_from mine' -l max-iterations");
    expect(lines).toContain("complete -c ledgerwork -n '__fish_seen_subcommand_from completions' -a 'bash zsh fish'");
  });
});

describe('completions', () => {
  it('dispatches by shell', () => {
    expect(completions('bash')).toBe(bashCompletions());
    expect(completions('zsh')).toBe(zshCompletions());
    expect(completions('fish')).toBe(fishCompletions());
  });

  it('recognises supported shells', () => {
    expect(SHELLS.every((s) => isShell(s))).toBe(true);
    expect(isShell('powershell')).toBe(false);
    expect(isShell(undefined)).toBe(false);
  });
});
