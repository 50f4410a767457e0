// src/errors.ts

/** Configuração ausente ou inválida. O processo não deve iniciar. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Falhas de carregamento da agenda; o manager as converte em `false` + motivo. */
export class ScheduleLoadError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ScheduleLoadError';
  }
}

export class SourceUnavailable extends ScheduleLoadError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'SourceUnavailable';
  }
}

export class SourceMalformed extends ScheduleLoadError {
  constructor(message: string, readonly row?: number) {
    super(row === undefined ? message : `linha ${row}: ${message}`);
    this.name = 'SourceMalformed';
  }
}

export class DuplicateScheduleEntry extends ScheduleLoadError {
  constructor(readonly instrument: string, readonly executeAt: number, readonly action: string) {
    super(`Entrada duplicada na agenda: ${instrument} ${action} @ ${new Date(executeAt).toISOString()}`);
    this.name = 'DuplicateScheduleEntry';
  }
}

/** Transição de status não permitida. Indica bug no sequenciamento do Dispatcher. */
export class InvalidTransition extends Error {
  constructor(readonly recordId: string, readonly from: string | undefined, readonly to: string) {
    super(
      from === undefined
        ? `Registro desconhecido: ${recordId}`
        : `Transição inválida para ${recordId}: ${from} -> ${to}`
    );
    this.name = 'InvalidTransition';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
