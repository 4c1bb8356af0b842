import type { DocumentKind } from "./types/document.types";

export class ConfigurationError extends Error {
  constructor(
    readonly kind: DocumentKind | "lexicons" | "unknown",
    readonly detail: string,
  ) {
    super(`Invalid ${kind} configuration: ${detail}`);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
