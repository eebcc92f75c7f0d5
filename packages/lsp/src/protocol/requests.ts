import { basename } from 'node:path';

import type { Position, Range } from '../types.js';
import { pathToUri } from '../utils/uri.js';
import {
  nextRequestId,
  type NotificationMessage,
  type RequestId,
  type RequestMessage,
} from './codec.js';

export const CompletionTriggerKind = {
  Invoked: 1,
  TriggerCharacter: 2,
  TriggerForIncompleteCompletions: 3,
} as const;

const SYMBOL_KINDS = Array.from({ length: 26 }, (_, index) => index + 1);
const MARKUP_FORMATS = ['plaintext', 'markdown'];

/**
 * What this client understands. Workspace folder support stays off:
 * pyright holds diagnostics back until it sees folder change events when
 * it is on.
 */
export const CLIENT_CAPABILITIES = {
  textDocument: {
    completion: {
      completionItem: {
        snippetSupport: false,
        documentationFormat: MARKUP_FORMATS,
        deprecatedSupport: true,
        labelDetailsSupport: true,
      },
      contextSupport: true,
    },
    hover: { contentFormat: MARKUP_FORMATS },
    definition: { linkSupport: true },
    references: {},
    documentSymbol: { hierarchicalDocumentSymbolSupport: true },
    codeAction: {
      codeActionLiteralSupport: {
        codeActionKind: {
          valueSet: [
            'quickfix',
            'refactor',
            'refactor.extract',
            'refactor.inline',
            'refactor.rewrite',
            'source',
            'source.organizeImports',
          ],
        },
      },
    },
    rename: { prepareSupport: true },
    publishDiagnostics: {
      relatedInformation: true,
      tagSupport: { valueSet: [1, 2] },
    },
    signatureHelp: {
      signatureInformation: {
        documentationFormat: MARKUP_FORMATS,
        parameterInformation: { labelOffsetSupport: true },
      },
    },
    formatting: {},
    synchronization: {
      didSave: true,
      willSave: false,
      willSaveWaitUntil: false,
    },
  },
  workspace: {
    workspaceFolders: false,
    symbol: { symbolKind: { valueSet: SYMBOL_KINDS } },
    applyEdit: true,
    workspaceEdit: { documentChanges: true },
  },
} as const;

export interface InitializeOptions {
  workspaceRoot: string;
  clientName: string;
  clientVersion: string;
  processId?: number;
}

export function initializeRequest(
  options: InitializeOptions,
  id: RequestId = nextRequestId(),
): RequestMessage {
  const rootUri = pathToUri(options.workspaceRoot);
  return {
    kind: 'request',
    id,
    method: 'initialize',
    params: {
      processId: options.processId ?? process.pid,
      clientInfo: { name: options.clientName, version: options.clientVersion },
      rootUri,
      rootPath: options.workspaceRoot,
      capabilities: CLIENT_CAPABILITIES,
      workspaceFolders: [
        {
          uri: rootUri,
          name: basename(options.workspaceRoot) || options.workspaceRoot,
        },
      ],
    },
  };
}

export function initializedNotification(): NotificationMessage {
  return { kind: 'notification', method: 'initialized', params: {} };
}

export function shutdownRequest(
  id: RequestId = nextRequestId(),
): RequestMessage {
  return { kind: 'request', id, method: 'shutdown' };
}

export function exitNotification(): NotificationMessage {
  return { kind: 'notification', method: 'exit' };
}

// Document synchronization

export function didOpenNotification(
  uri: string,
  languageId: string,
  version: number,
  text: string,
): NotificationMessage {
  return {
    kind: 'notification',
    method: 'textDocument/didOpen',
    params: { textDocument: { uri, languageId, version, text } },
  };
}

/** Full-document sync: the whole text replaces the previous version. */
export function didChangeNotification(
  uri: string,
  version: number,
  text: string,
): NotificationMessage {
  return {
    kind: 'notification',
    method: 'textDocument/didChange',
    params: {
      textDocument: { uri, version },
      contentChanges: [{ text }],
    },
  };
}

export function didSaveNotification(
  uri: string,
  text?: string,
): NotificationMessage {
  return {
    kind: 'notification',
    method: 'textDocument/didSave',
    params:
      text === undefined
        ? { textDocument: { uri } }
        : { textDocument: { uri }, text },
  };
}

export function didCloseNotification(uri: string): NotificationMessage {
  return {
    kind: 'notification',
    method: 'textDocument/didClose',
    params: { textDocument: { uri } },
  };
}

// Language features

function positionParams(uri: string, position: Position) {
  return {
    textDocument: { uri },
    position: { line: position.line, character: position.character },
  };
}

function copyRange(range: Range): Range {
  return {
    start: { line: range.start.line, character: range.start.character },
    end: { line: range.end.line, character: range.end.character },
  };
}

export function completionRequest(
  uri: string,
  position: Position,
  id: RequestId = nextRequestId(),
): RequestMessage {
  return {
    kind: 'request',
    id,
    method: 'textDocument/completion',
    params: {
      ...positionParams(uri, position),
      context: { triggerKind: CompletionTriggerKind.Invoked },
    },
  };
}

export function hoverRequest(
  uri: string,
  position: Position,
  id: RequestId = nextRequestId(),
): RequestMessage {
  return {
    kind: 'request',
    id,
    method: 'textDocument/hover',
    params: positionParams(uri, position),
  };
}

export function definitionRequest(
  uri: string,
  position: Position,
  id: RequestId = nextRequestId(),
): RequestMessage {
  return {
    kind: 'request',
    id,
    method: 'textDocument/definition',
    params: positionParams(uri, position),
  };
}

export function referencesRequest(
  uri: string,
  position: Position,
  includeDeclaration: boolean,
  id: RequestId = nextRequestId(),
): RequestMessage {
  return {
    kind: 'request',
    id,
    method: 'textDocument/references',
    params: {
      ...positionParams(uri, position),
      context: { includeDeclaration },
    },
  };
}

export function renameRequest(
  uri: string,
  position: Position,
  newName: string,
  id: RequestId = nextRequestId(),
): RequestMessage {
  return {
    kind: 'request',
    id,
    method: 'textDocument/rename',
    params: { ...positionParams(uri, position), newName },
  };
}

export function codeActionRequest(
  uri: string,
  range: Range,
  id: RequestId = nextRequestId(),
): RequestMessage {
  return {
    kind: 'request',
    id,
    method: 'textDocument/codeAction',
    params: {
      textDocument: { uri },
      range: copyRange(range),
      context: { diagnostics: [] },
    },
  };
}

export function documentSymbolRequest(
  uri: string,
  id: RequestId = nextRequestId(),
): RequestMessage {
  return {
    kind: 'request',
    id,
    method: 'textDocument/documentSymbol',
    params: { textDocument: { uri } },
  };
}

export function workspaceSymbolRequest(
  query: string,
  id: RequestId = nextRequestId(),
): RequestMessage {
  return {
    kind: 'request',
    id,
    method: 'workspace/symbol',
    params: { query },
  };
}

export function signatureHelpRequest(
  uri: string,
  position: Position,
  id: RequestId = nextRequestId(),
): RequestMessage {
  return {
    kind: 'request',
    id,
    method: 'textDocument/signatureHelp',
    params: positionParams(uri, position),
  };
}

export function formattingRequest(
  uri: string,
  tabSize: number,
  insertSpaces: boolean,
  id: RequestId = nextRequestId(),
): RequestMessage {
  return {
    kind: 'request',
    id,
    method: 'textDocument/formatting',
    params: {
      textDocument: { uri },
      options: {
        tabSize,
        insertSpaces,
        trimTrailingWhitespace: true,
        insertFinalNewline: true,
      },
    },
  };
}
