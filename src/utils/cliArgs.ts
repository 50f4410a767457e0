export type CliMode = 'summary' | 'trade';

export interface CliArgs {
  mode: CliMode;
  dryRun: boolean;
  /** summary: grava a agenda normalizada em CSV */
  exportPath?: string;
}

export const USAGE = 'Uso: fx-schedule-trader <summary|trade> [--dry-run] [--export <arquivo.csv>]';

export function parseArgs(argv: readonly string[]): CliArgs {
  let mode: CliMode | undefined;
  let dryRun = false;
  let exportPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--dry-run') {
      dryRun = true;
    } else if (arg === '--export') {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`--export precisa de um caminho. ${USAGE}`);
      }
      exportPath = next;
      i++;
    } else if ((arg === 'summary' || arg === 'trade') && mode === undefined) {
      mode = arg;
    } else {
      throw new Error(`Argumento desconhecido: ${arg}. ${USAGE}`);
    }
  }

  const resolved = mode ?? 'trade';
  if (exportPath !== undefined && resolved !== 'summary') {
    throw new Error(`--export só vale no modo summary. ${USAGE}`);
  }
  return { mode: resolved, dryRun, exportPath };
}
