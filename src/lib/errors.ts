/* ──────────────────────────────────────────────────────────────────────────
   src/lib/errors.ts
   --------------------------------------------------------------------------
   Error taxonomy for a research run. Every fatal path ends in one of these;
   the CLI maps them to "Error: <message>" on stderr and exit code 1.
   ------------------------------------------------------------------------ */

export type ResearchErrorKind =
  | "MissingCredential"
  | "NetworkFailure"
  | "InvalidResponseSchema"
  | "FileWriteFailure"
  | "InvalidInput";

export abstract class ResearchError extends Error {
  abstract readonly kind: ResearchErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingCredentialError extends ResearchError {
  readonly kind = "MissingCredential";

  constructor(readonly variable: string) {
    super(
      `${variable} environment variable not set. ` +
        "Create a key at https://platform.openai.com/api-keys and export it, or put it in .env",
    );
  }
}

export class NetworkFailureError extends ResearchError {
  readonly kind = "NetworkFailure";

  constructor(
    readonly label: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`${label}: ${message}`, options);
  }
}

export class InvalidResponseSchemaError extends ResearchError {
  readonly kind = "InvalidResponseSchema";

  constructor(
    readonly label: string,
    readonly fields: string[],
    options?: { cause?: unknown },
  ) {
    super(`${label}: response failed schema validation (${fields.join(", ")})`, options);
  }
}

export class FileWriteFailureError extends ResearchError {
  readonly kind = "FileWriteFailure";

  constructor(readonly path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Could not write ${path}${reason}`, options);
  }
}

export class InvalidInputError extends ResearchError {
  readonly kind = "InvalidInput";
}

export const isResearchError = (e: unknown): e is ResearchError => e instanceof ResearchError;

/** Normalises anything thrown into an Error, the way the pipeline logs it. */
export const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));
