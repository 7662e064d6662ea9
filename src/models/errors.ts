/**
 * Fallo de cualquier tipo al llamar al servicio de completions
 * (credencial, red, timeout, cuota o respuesta mal formada).
 */
export class CompletionError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "CompletionError";
    this.status = options.status;
  }
}

export class SessionBusyError extends Error {
  constructor() {
    super("A reply is still being generated for this session.");
    this.name = "SessionBusyError";
  }
}

export class SessionNotFoundError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} not found.`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}
