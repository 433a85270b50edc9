export class PokeDexError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Requisição falhou, expirou ou voltou com status de erro diferente de 404. */
export class NetworkError extends PokeDexError {
    constructor(public readonly url: string, message: string, public readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class NotFoundError extends PokeDexError {
    constructor(public readonly url: string) {
        super(`No data at ${url}`);
    }
}

/** Payload chegou sem um campo do qual o pipeline depende. */
export class DataShapeError extends PokeDexError {
    constructor(public readonly resource: string, public readonly field: string) {
        super(`Unexpected payload for ${resource}: missing or invalid '${field}'`);
    }
}

export class IOError extends PokeDexError {
    constructor(public readonly path: string, message: string, options?: { cause?: unknown }) {
        super(`${message} (${path})`, options);
    }
}

export class ConfigError extends PokeDexError {}

/** Erros que pulam uma cadeia ou espécie em vez de abortar a execução. */
export function isRecoverable(error: unknown): boolean {
    return error instanceof NetworkError || error instanceof NotFoundError || error instanceof DataShapeError;
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return 'Unknown error';
}

export function getErrorStack(error: unknown): string | undefined {
    if (error instanceof Error) return error.stack;
    return undefined;
}

export function logError(context: string, error: unknown, metadata?: Record<string, unknown>) {
    console.error(`[${context}] Error:`, {
        message: getErrorMessage(error),
        stack: getErrorStack(error),
        metadata,
        timestamp: new Date().toISOString()
    });
}
