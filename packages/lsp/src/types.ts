export interface Position {
  /** Zero-based line. */
  line: number;
  /** Zero-based UTF-16 code unit offset within the line. */
  character: number;
}

export interface Range {
  start: Position;
  end: Position;
}

export interface Location {
  uri: string;
  range: Range;
}

export interface TextEdit {
  range: Range;
  newText: string;
}

/** Edits keyed by document uri. */
export type WorkspaceEdit = Record<string, TextEdit[]>;

export const DiagnosticSeverity = {
  Error: 1,
  Warning: 2,
  Information: 3,
  Hint: 4,
} as const;

export type DiagnosticSeverity =
  (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity];

export interface Diagnostic {
  range: Range;
  severity?: DiagnosticSeverity;
  code?: string;
  source?: string;
  message: string;
}

export interface CompletionItem {
  label: string;
  /** LSP CompletionItemKind, 1 (Text) through 25 (TypeParameter). */
  kind?: number;
  detail?: string;
  documentation?: string;
  insertText?: string;
  textEdit?: TextEdit;
  sortText?: string;
  filterText?: string;
}

export interface Hover {
  /** Plain or markdown text; multiple sections are joined by a blank line. */
  contents: string;
  range?: Range;
}

export interface DocumentSymbol {
  name: string;
  /** LSP SymbolKind, 1 (File) through 26 (TypeParameter). */
  kind: number;
  detail?: string;
  range: Range;
  selectionRange: Range;
  children: DocumentSymbol[];
}

export interface WorkspaceSymbol {
  name: string;
  kind: number;
  location: Location;
  containerName?: string;
}

export interface CodeAction {
  title: string;
  kind?: string;
  edit?: WorkspaceEdit;
  /** Command identifier to execute, when the action carries one. */
  command?: string;
}

export interface SignatureInformation {
  label: string;
  documentation?: string;
  parameters: string[];
}

export interface SignatureHelp {
  signatures: SignatureInformation[];
  activeSignature: number;
  activeParameter: number;
}

export const CAPABILITY_NAMES = [
  'completion',
  'hover',
  'definition',
  'references',
  'rename',
  'codeActions',
  'formatting',
  'diagnostics',
  'documentSymbols',
  'workspaceSymbols',
  'signatureHelp',
] as const;

export type CapabilityName = (typeof CAPABILITY_NAMES)[number];

export type Capabilities = Record<CapabilityName, boolean>;

/**
 * Builds a capability set: `true` enables everything, `false` nothing, and a
 * list enables exactly the named features.
 */
export function createCapabilities(
  enabled: boolean | Iterable<CapabilityName>,
): Capabilities {
  const names = typeof enabled === 'boolean' ? null : new Set(enabled);
  const has = (name: CapabilityName): boolean =>
    names ? names.has(name) : enabled === true;
  return {
    completion: has('completion'),
    hover: has('hover'),
    definition: has('definition'),
    references: has('references'),
    rename: has('rename'),
    codeActions: has('codeActions'),
    formatting: has('formatting'),
    diagnostics: has('diagnostics'),
    documentSymbols: has('documentSymbols'),
    workspaceSymbols: has('workspaceSymbols'),
    signatureHelp: has('signatureHelp'),
  };
}

export interface ServerConfig {
  /** Unique within a language, e.g. `pyright`. */
  name: string;
  /** Language identifier, e.g. `python`. */
  language: string;
  /** Program followed by its arguments; resolved through PATH. */
  command: readonly string[];
  /** Features this server is allowed to serve. */
  capabilities: Capabilities;
}

export type ServerState =
  | 'starting'
  | 'initializing'
  | 'ready'
  | 'shutting-down'
  | 'stopped';

export interface ServerStatus {
  language: string;
  name: string;
  state: ServerState;
  pid: number | undefined;
}
