export class InstallerError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "InstallerError";
  }
}

export class NetworkError extends InstallerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NETWORK", message, options);
    this.name = "NetworkError";
  }
}

export class DownloadError extends NetworkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DownloadError";
  }
}

export class NotFoundError extends InstallerError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class ExtractError extends InstallerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EXTRACT", message, options);
    this.name = "ExtractError";
  }
}

export class MissingAssetError extends InstallerError {
  constructor(message: string) {
    super("MISSING_ASSET", message);
    this.name = "MissingAssetError";
  }
}

export class FilesystemError extends InstallerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FILESYSTEM", message, options);
    this.name = "FilesystemError";
  }
}

export class ExternalToolError extends InstallerError {
  readonly exitCode: number | null;

  constructor(
    message: string,
    exitCode: number | null,
    options?: { cause?: unknown },
  ) {
    super("EXTERNAL_TOOL", message, options);
    this.exitCode = exitCode;
    this.name = "ExternalToolError";
  }
}

/** Bad arguments or selections, raised before anything is applied. */
export class InstallError extends InstallerError {
  constructor(message: string) {
    super("INSTALL", message);
    this.name = "InstallError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
