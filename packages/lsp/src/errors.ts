export type LspErrorCode =
  | 'SPAWN_FAILED'
  | 'WRITE_FAILED'
  | 'NO_SERVER_AVAILABLE'
  | 'DOCUMENT_NOT_OPEN'
  | 'INVALID_CONFIG';

export abstract class LspError extends Error {
  abstract readonly code: LspErrorCode;
}

export class SpawnFailedError extends LspError {
  readonly code = 'SPAWN_FAILED';
  readonly command: readonly string[];

  constructor(command: readonly string[], reason: string) {
    const program = command[0] ?? '<empty>';
    super(`Failed to start '${program}': ${reason}`);
    this.name = 'SpawnFailedError';
    this.command = command;
  }
}

export class WriteFailedError extends LspError {
  readonly code = 'WRITE_FAILED';
  readonly pid: number | undefined;

  constructor(pid: number | undefined, reason: string) {
    super(`Cannot write to language server (pid ${String(pid)}): ${reason}`);
    this.name = 'WriteFailedError';
    this.pid = pid;
  }
}

export interface CandidateFailure {
  server: string;
  reason: string;
}

export class NoServerAvailableError extends LspError {
  readonly code = 'NO_SERVER_AVAILABLE';
  readonly language: string;
  readonly failures: readonly CandidateFailure[];

  constructor(language: string, failures: readonly CandidateFailure[] = []) {
    const detail =
      failures.length === 0
        ? 'no servers configured'
        : failures.map((f) => `${f.server}: ${f.reason}`).join('; ');
    super(`No language server available for '${language}' (${detail})`);
    this.name = 'NoServerAvailableError';
    this.language = language;
    this.failures = failures;
  }
}

export class DocumentNotOpenError extends LspError {
  readonly code = 'DOCUMENT_NOT_OPEN';
  readonly path: string;

  constructor(path: string) {
    super(`Document is not open: ${path}`);
    this.name = 'DocumentNotOpenError';
    this.path = path;
  }
}

export class LspConfigError extends LspError {
  readonly code = 'INVALID_CONFIG';
  readonly file: string;

  constructor(file: string, reason: string) {
    super(`Invalid language server config in ${file}: ${reason}`);
    this.name = 'LspConfigError';
    this.file = file;
  }
}
