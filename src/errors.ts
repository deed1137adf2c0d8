export type DirectoryOperation =
  | "connect"
  | "testConnection"
  | "listAllUsers"
  | "listAuthMethods"
  | "findUserByPrincipalName"
  | "resolveManagerDisplayName";

export class DirectoryError extends Error {
  constructor(
    message: string,
    public readonly operation: DirectoryOperation,
    public readonly principalName?: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "DirectoryError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly setting: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ReportFormatError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = "ReportFormatError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
