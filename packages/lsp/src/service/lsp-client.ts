import { DebugLogger } from '@quire/core';

import { loadLspConfig, type LspConfig } from '../config.js';
import { DocumentNotOpenError } from '../errors.js';
import type { RequestId, RequestMessage } from '../protocol/codec.js';
import {
  codeActionRequest,
  completionRequest,
  definitionRequest,
  didChangeNotification,
  didCloseNotification,
  didOpenNotification,
  didSaveNotification,
  documentSymbolRequest,
  formattingRequest,
  hoverRequest,
  referencesRequest,
  renameRequest,
  signatureHelpRequest,
  workspaceSymbolRequest,
} from '../protocol/requests.js';
import {
  parseCodeActions,
  parseCompletionItems,
  parseDocumentSymbols,
  parseHover,
  parseLocations,
  parseSignatureHelp,
  parseTextEdits,
  parseWorkspaceEdit,
  parseWorkspaceSymbols,
} from '../protocol/responses.js';
import type {
  CodeAction,
  CompletionItem,
  Diagnostic,
  DocumentSymbol,
  Hover,
  Location,
  Position,
  Range,
  SignatureHelp,
  TextEdit,
  WorkspaceEdit,
  WorkspaceSymbol,
} from '../types.js';
import { pathToUri } from '../utils/uri.js';
import { DiagnosticsCache, type DiagnosticsListener } from './diagnostics.js';
import { detectLanguage } from './language-map.js';
import type { ResponseResult } from './message-router.js';
import { ServerManager } from './server-manager.js';

const logger = new DebugLogger('quire:lsp:client');

/** A parsed reply to one feature request, tagged with the request id. */
export type LspResponse =
  | { kind: 'completions'; id: RequestId; items: CompletionItem[] }
  | { kind: 'hover'; id: RequestId; hover: Hover | undefined }
  | { kind: 'definition'; id: RequestId; locations: Location[] }
  | { kind: 'references'; id: RequestId; locations: Location[] }
  | { kind: 'symbols'; id: RequestId; symbols: DocumentSymbol[] }
  | { kind: 'workspaceSymbols'; id: RequestId; symbols: WorkspaceSymbol[] }
  | {
      kind: 'signatureHelp';
      id: RequestId;
      signatureHelp: SignatureHelp | undefined;
    }
  | { kind: 'formatting'; id: RequestId; edits: TextEdit[] }
  | { kind: 'rename'; id: RequestId; edit: WorkspaceEdit }
  | { kind: 'codeActions'; id: RequestId; actions: CodeAction[] }
  | { kind: 'error'; id: RequestId; code: number; message: string };

interface DocumentInfo {
  uri: string;
  languageId: string;
  version: number;
}

export interface LspClientOptions {
  workspaceRoot: string;
  /** Used as is; otherwise one is built from `config`. */
  manager?: ServerManager;
  /** Defaults to the config files for `workspaceRoot`. */
  config?: LspConfig;
}

/**
 * The editor-facing surface: tracks open documents, turns edits into
 * synchronization notifications, and queues parsed replies to feature
 * requests for the editor to poll.
 */
export class LspClient {
  readonly manager: ServerManager;
  private readonly documents = new Map<string, DocumentInfo>();
  private readonly responses: LspResponse[] = [];
  private readonly diagnostics = new DiagnosticsCache();

  constructor(options: LspClientOptions) {
    this.manager =
      options.manager ??
      ServerManager.fromConfig(
        options.config ??
          loadLspConfig({ workspaceRoot: options.workspaceRoot }),
        { workspaceRoot: options.workspaceRoot },
      );
    this.manager.setDiagnosticsCallback((uri, diagnostics) =>
      this.diagnostics.set(uri, diagnostics),
    );
  }

  /**
   * Starts tracking a document and announces it to its language server.
   * Files without a known language and documents already open are ignored.
   */
  openDocument(path: string, content: string): void {
    const languageId = detectLanguage(path);
    if (languageId === undefined || this.documents.has(path)) {
      return;
    }

    const uri = pathToUri(path);
    this.documents.set(path, { uri, languageId, version: 1 });
    this.manager.sendNotification(
      languageId,
      didOpenNotification(uri, languageId, 1, content),
    );
  }

  /** Sends the full new text of an open document. */
  documentChanged(path: string, content: string): void {
    const doc = this.documents.get(path);
    if (!doc) {
      return;
    }
    doc.version += 1;
    this.manager.sendNotification(
      doc.languageId,
      didChangeNotification(doc.uri, doc.version, content),
    );
  }

  documentSaved(path: string, content?: string): void {
    const doc = this.documents.get(path);
    if (!doc) {
      return;
    }
    this.manager.sendNotification(
      doc.languageId,
      didSaveNotification(doc.uri, content),
    );
  }

  /** Stops tracking a document and forgets its diagnostics. */
  closeDocument(path: string): void {
    const doc = this.documents.get(path);
    if (!doc) {
      return;
    }
    this.documents.delete(path);
    try {
      this.manager.sendNotification(
        doc.languageId,
        didCloseNotification(doc.uri),
      );
    } finally {
      this.diagnostics.delete(doc.uri);
    }
  }

  isDocumentOpen(path: string): boolean {
    return this.documents.has(path);
  }

  async requestCompletions(path: string, position: Position): Promise<RequestId> {
    return this.request(
      path,
      (uri) => completionRequest(uri, position),
      (id, value) => ({
        kind: 'completions',
        id,
        items: parseCompletionItems(value),
      }),
    );
  }

  async requestHover(path: string, position: Position): Promise<RequestId> {
    return this.request(
      path,
      (uri) => hoverRequest(uri, position),
      (id, value) => ({ kind: 'hover', id, hover: parseHover(value) }),
    );
  }

  async requestDefinition(path: string, position: Position): Promise<RequestId> {
    return this.request(
      path,
      (uri) => definitionRequest(uri, position),
      (id, value) => ({
        kind: 'definition',
        id,
        locations: parseLocations(value),
      }),
    );
  }

  async requestReferences(
    path: string,
    position: Position,
    includeDeclaration = true,
  ): Promise<RequestId> {
    return this.request(
      path,
      (uri) => referencesRequest(uri, position, includeDeclaration),
      (id, value) => ({
        kind: 'references',
        id,
        locations: parseLocations(value),
      }),
    );
  }

  async requestDocumentSymbols(path: string): Promise<RequestId> {
    return this.request(
      path,
      (uri) => documentSymbolRequest(uri),
      (id, value) => ({
        kind: 'symbols',
        id,
        symbols: parseDocumentSymbols(value),
      }),
    );
  }

  /** Searches symbols across the workspace of the server owning `path`. */
  async requestWorkspaceSymbols(path: string, query: string): Promise<RequestId> {
    return this.request(
      path,
      () => workspaceSymbolRequest(query),
      (id, value) => ({
        kind: 'workspaceSymbols',
        id,
        symbols: parseWorkspaceSymbols(value),
      }),
    );
  }

  async requestSignatureHelp(
    path: string,
    position: Position,
  ): Promise<RequestId> {
    return this.request(
      path,
      (uri) => signatureHelpRequest(uri, position),
      (id, value) => ({
        kind: 'signatureHelp',
        id,
        signatureHelp: parseSignatureHelp(value),
      }),
    );
  }

  async requestFormatting(
    path: string,
    tabSize: number,
    insertSpaces: boolean,
  ): Promise<RequestId> {
    return this.request(
      path,
      (uri) => formattingRequest(uri, tabSize, insertSpaces),
      (id, value) => ({ kind: 'formatting', id, edits: parseTextEdits(value) }),
    );
  }

  async requestRename(
    path: string,
    position: Position,
    newName: string,
  ): Promise<RequestId> {
    return this.request(
      path,
      (uri) => renameRequest(uri, position, newName),
      (id, value) => ({ kind: 'rename', id, edit: parseWorkspaceEdit(value) }),
    );
  }

  async requestCodeActions(path: string, range: Range): Promise<RequestId> {
    return this.request(
      path,
      (uri) => codeActionRequest(uri, range),
      (id, value) => ({
        kind: 'codeActions',
        id,
        actions: parseCodeActions(value),
      }),
    );
  }

  /** Oldest queued reply, if any. Never waits. */
  pollResponse(): LspResponse | undefined {
    return this.responses.shift();
  }

  getDiagnostics(path: string): Diagnostic[] {
    return this.diagnostics.get(pathToUri(path));
  }

  getAllDiagnostics(): Map<string, Diagnostic[]> {
    return this.diagnostics.snapshot();
  }

  onDiagnostics(listener: DiagnosticsListener): () => void {
    return this.diagnostics.onChange(listener);
  }

  processMessages(): void {
    this.manager.processMessages();
  }

  hasServer(language: string): boolean {
    return this.manager.hasServer(language);
  }

  hasServerForFile(path: string): boolean {
    const languageId = detectLanguage(path);
    return languageId !== undefined && this.manager.hasServer(languageId);
  }

  async shutdown(): Promise<void> {
    await this.manager.stopAll();
  }

  private async request(
    path: string,
    build: (uri: string) => RequestMessage,
    toResponse: (id: RequestId, value: unknown) => LspResponse,
  ): Promise<RequestId> {
    const doc = this.documents.get(path);
    if (!doc) {
      throw new DocumentNotOpenError(path);
    }

    const request = build(doc.uri);
    await this.manager.sendRequest(
      doc.languageId,
      request,
      (id, result: ResponseResult) => {
        this.responses.push(
          result.ok
            ? toResponse(id, result.value)
            : {
                kind: 'error',
                id,
                code: result.error.code,
                message: result.error.message,
              },
        );
      },
    );
    logger.debug(() => `${request.method} #${String(request.id)} sent for ${path}`);
    return request.id;
  }
}
