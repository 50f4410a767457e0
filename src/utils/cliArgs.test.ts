import { describe, expect, it } from 'vitest';
import { parseArgs } from './cliArgs';

describe('parseArgs', () => {
  it('trade é o modo padrão', () => {
    expect(parseArgs([])).toEqual({ mode: 'trade', dryRun: false, exportPath: undefined });
  });

  it('lê modo, --dry-run e --export', () => {
    expect(parseArgs(['summary', '--export', 'out/agenda.csv'])).toEqual({
      mode: 'summary',
      dryRun: false,
      exportPath: 'out/agenda.csv'
    });
    expect(parseArgs(['--dry-run', 'trade'])).toEqual({ mode: 'trade', dryRun: true, exportPath: undefined });
  });

  it('rejeita argumento desconhecido', () => {
    expect(() => parseArgs(['backtest'])).toThrow('Argumento desconhecido: backtest.');
    expect(() => parseArgs(['summary', 'trade'])).toThrow('Argumento desconhecido: trade.');
  });

  it('--export fora do modo summary', () => {
    expect(() => parseArgs(['trade', '--export', 'x.csv'])).toThrow('--export só vale no modo summary.');
    expect(() => parseArgs(['--export', 'x.csv'])).toThrow('--export só vale no modo summary.');
    expect(parseArgs(['--export', 'x.csv', 'summary']).exportPath).toBe('x.csv');
  });

  it('--export sem caminho', () => {
    expect(() => parseArgs(['summary', '--export'])).toThrow('--export precisa de um caminho.');
  });
});
