/**
 * Pure transforms from raw JSON-RPC results into the editor's types. Every
 * parser accepts `unknown` and drops entries it cannot read instead of
 * throwing.
 */
import {
  DiagnosticSeverity,
  type Capabilities,
  type CodeAction,
  type CompletionItem,
  type Diagnostic,
  type DocumentSymbol,
  type Hover,
  type Location,
  type Position,
  type Range,
  type SignatureHelp,
  type SignatureInformation,
  type TextEdit,
  type WorkspaceEdit,
  type WorkspaceSymbol,
} from '../types.js';
import { isRecord } from './codec.js';

const EMPTY_LOCATIONS: Location[] = [];
const EMPTY_EDITS: TextEdit[] = [];

const getString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

const getCount = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0
    ? value
    : undefined;

// A provider counts when the server sent it with any value but null/false.
const provides = (caps: Record<string, unknown>, key: string): boolean =>
  caps[key] !== undefined && caps[key] !== null && caps[key] !== false;

/**
 * Reads `result.capabilities` of an initialize response (or the value itself
 * when it is already a capabilities object). Diagnostics are pushed by the
 * server, so they always count as supported.
 */
export function parseCapabilities(result: unknown): Capabilities {
  const caps = isRecord(result)
    ? isRecord(result.capabilities)
      ? result.capabilities
      : result
    : {};

  return {
    completion: provides(caps, 'completionProvider'),
    hover: provides(caps, 'hoverProvider'),
    definition: provides(caps, 'definitionProvider'),
    references: provides(caps, 'referencesProvider'),
    rename: provides(caps, 'renameProvider'),
    codeActions: provides(caps, 'codeActionProvider'),
    formatting: provides(caps, 'documentFormattingProvider'),
    diagnostics: true,
    documentSymbols: provides(caps, 'documentSymbolProvider'),
    workspaceSymbols: provides(caps, 'workspaceSymbolProvider'),
    signatureHelp: provides(caps, 'signatureHelpProvider'),
  };
}

export function parsePosition(value: unknown): Position | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const line = getCount(value.line);
  const character = getCount(value.character);
  if (line === undefined || character === undefined) {
    return undefined;
  }
  return { line, character };
}

export function parseRange(value: unknown): Range | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const start = parsePosition(value.start);
  const end = parsePosition(value.end);
  return start && end ? { start, end } : undefined;
}

/**
 * Accepts a `Location` or a `LocationLink`; a link resolves to its target
 * selection range.
 */
export function parseLocation(value: unknown): Location | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const uri = getString(value.uri);
  if (uri !== undefined) {
    const range = parseRange(value.range);
    return range ? { uri, range } : undefined;
  }
  const targetUri = getString(value.targetUri);
  const targetRange =
    parseRange(value.targetSelectionRange) ?? parseRange(value.targetRange);
  return targetUri !== undefined && targetRange
    ? { uri: targetUri, range: targetRange }
    : undefined;
}

/** Definition and references results: one location, a list, or null. */
export function parseLocations(result: unknown): Location[] {
  if (Array.isArray(result)) {
    return result.flatMap((item) => {
      const location = parseLocation(item);
      return location ? [location] : EMPTY_LOCATIONS;
    });
  }
  const single = parseLocation(result);
  return single ? [single] : EMPTY_LOCATIONS;
}

function parseDocumentation(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  return isRecord(value) ? getString(value.value) : undefined;
}

export function parseTextEdit(value: unknown): TextEdit | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const range = parseRange(value.range);
  const newText = getString(value.newText);
  return range && newText !== undefined ? { range, newText } : undefined;
}

/** Accepts a bare item array or a `CompletionList`. */
export function parseCompletionItems(result: unknown): CompletionItem[] {
  const items = Array.isArray(result)
    ? result
    : isRecord(result) && Array.isArray(result.items)
      ? result.items
      : [];

  const parsed: CompletionItem[] = [];
  for (const item of items) {
    if (!isRecord(item)) {
      continue;
    }
    const label = getString(item.label);
    if (label === undefined) {
      continue;
    }
    const completion: CompletionItem = { label };
    const kind = getCount(item.kind);
    if (kind !== undefined && kind >= 1 && kind <= 25) {
      completion.kind = kind;
    }
    const detail = getString(item.detail);
    if (detail !== undefined) completion.detail = detail;
    const documentation = parseDocumentation(item.documentation);
    if (documentation !== undefined) completion.documentation = documentation;
    const insertText = getString(item.insertText);
    if (insertText !== undefined) completion.insertText = insertText;
    const textEdit = parseTextEdit(item.textEdit);
    if (textEdit) completion.textEdit = textEdit;
    const sortText = getString(item.sortText);
    if (sortText !== undefined) completion.sortText = sortText;
    const filterText = getString(item.filterText);
    if (filterText !== undefined) completion.filterText = filterText;
    parsed.push(completion);
  }
  return parsed;
}

/**
 * Hover contents may be a string, a `MarkupContent`, a `MarkedString`, or a
 * list of those; list sections are joined by a blank line.
 */
export function parseHover(result: unknown): Hover | undefined {
  if (!isRecord(result)) {
    return undefined;
  }
  const contents = result.contents;
  let text: string | undefined;
  if (typeof contents === 'string') {
    text = contents;
  } else if (Array.isArray(contents)) {
    text = contents
      .map(parseDocumentation)
      .filter((section): section is string => section !== undefined)
      .join('\n\n');
  } else if (isRecord(contents)) {
    text = getString(contents.value);
  }
  if (text === undefined) {
    return undefined;
  }
  const range = parseRange(result.range);
  return range ? { contents: text, range } : { contents: text };
}

function parseDocumentSymbol(value: unknown): DocumentSymbol | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const name = getString(value.name);
  const kind = getCount(value.kind);
  if (name === undefined || kind === undefined || kind < 1 || kind > 26) {
    return undefined;
  }

  let range: Range | undefined;
  let selectionRange: Range | undefined;
  if (value.range !== undefined) {
    range = parseRange(value.range);
    selectionRange = parseRange(value.selectionRange) ?? range;
  } else if (isRecord(value.location)) {
    // SymbolInformation
    range = parseRange(value.location.range);
    selectionRange = range;
  }
  if (!range || !selectionRange) {
    return undefined;
  }

  const children = Array.isArray(value.children)
    ? parseDocumentSymbols(value.children)
    : [];
  const symbol: DocumentSymbol = {
    name,
    kind,
    range,
    selectionRange,
    children,
  };
  const detail = getString(value.detail);
  if (detail !== undefined) {
    symbol.detail = detail;
  }
  return symbol;
}

/** Accepts hierarchical `DocumentSymbol`s or flat `SymbolInformation`s. */
export function parseDocumentSymbols(result: unknown): DocumentSymbol[] {
  if (!Array.isArray(result)) {
    return [];
  }
  const symbols: DocumentSymbol[] = [];
  for (const item of result) {
    const symbol = parseDocumentSymbol(item);
    if (symbol) {
      symbols.push(symbol);
    }
  }
  return symbols;
}

export function parseWorkspaceSymbols(result: unknown): WorkspaceSymbol[] {
  if (!Array.isArray(result)) {
    return [];
  }
  const symbols: WorkspaceSymbol[] = [];
  for (const item of result) {
    if (!isRecord(item)) {
      continue;
    }
    const name = getString(item.name);
    const kind = getCount(item.kind);
    const location = parseLocation(item.location);
    if (name === undefined || kind === undefined || !location) {
      continue;
    }
    const symbol: WorkspaceSymbol = { name, kind, location };
    const containerName = getString(item.containerName);
    if (containerName !== undefined) {
      symbol.containerName = containerName;
    }
    symbols.push(symbol);
  }
  return symbols;
}

const SEVERITIES: readonly DiagnosticSeverity[] =
  Object.values(DiagnosticSeverity);

function parseSeverity(value: unknown): DiagnosticSeverity | undefined {
  return SEVERITIES.find((severity) => severity === value);
}

export function parseDiagnostic(value: unknown): Diagnostic | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const range = parseRange(value.range);
  const message = getString(value.message);
  if (!range || message === undefined) {
    return undefined;
  }
  const diagnostic: Diagnostic = { range, message };
  const severity = parseSeverity(value.severity);
  if (severity !== undefined) {
    diagnostic.severity = severity;
  }
  if (typeof value.code === 'string') {
    diagnostic.code = value.code;
  } else if (typeof value.code === 'number' && Number.isInteger(value.code)) {
    diagnostic.code = String(value.code);
  }
  const source = getString(value.source);
  if (source !== undefined) {
    diagnostic.source = source;
  }
  return diagnostic;
}

export interface PublishedDiagnostics {
  uri: string;
  diagnostics: Diagnostic[];
}

/** Params of a `textDocument/publishDiagnostics` notification. */
export function parsePublishDiagnostics(params: unknown): PublishedDiagnostics {
  if (!isRecord(params)) {
    return { uri: '', diagnostics: [] };
  }
  const diagnostics: Diagnostic[] = [];
  if (Array.isArray(params.diagnostics)) {
    for (const item of params.diagnostics) {
      const diagnostic = parseDiagnostic(item);
      if (diagnostic) {
        diagnostics.push(diagnostic);
      }
    }
  }
  return { uri: getString(params.uri) ?? '', diagnostics };
}

export function parseTextEdits(result: unknown): TextEdit[] {
  if (!Array.isArray(result)) {
    return EMPTY_EDITS;
  }
  return result.flatMap((item) => {
    const edit = parseTextEdit(item);
    return edit ? [edit] : EMPTY_EDITS;
  });
}

/**
 * Merges the `changes` map and the `documentChanges` list of a
 * `WorkspaceEdit`. File create/rename/delete operations are skipped.
 */
export function parseWorkspaceEdit(result: unknown): WorkspaceEdit {
  const edit: WorkspaceEdit = {};
  if (!isRecord(result)) {
    return edit;
  }

  if (isRecord(result.changes)) {
    for (const [uri, edits] of Object.entries(result.changes)) {
      edit[uri] = parseTextEdits(edits);
    }
  }

  if (Array.isArray(result.documentChanges)) {
    for (const change of result.documentChanges) {
      if (!isRecord(change) || !isRecord(change.textDocument)) {
        continue;
      }
      const uri = getString(change.textDocument.uri) ?? '';
      edit[uri] = parseTextEdits(change.edits);
    }
  }

  return edit;
}

/**
 * Accepts `CodeAction` literals and bare `Command`s (a command's `command`
 * field is its identifier string).
 */
export function parseCodeActions(result: unknown): CodeAction[] {
  if (!Array.isArray(result)) {
    return [];
  }
  const actions: CodeAction[] = [];
  for (const item of result) {
    if (!isRecord(item)) {
      continue;
    }
    const title = getString(item.title);
    if (title === undefined) {
      continue;
    }
    const action: CodeAction = { title };
    const kind = getString(item.kind);
    if (kind !== undefined) {
      action.kind = kind;
    }
    if (isRecord(item.edit)) {
      action.edit = parseWorkspaceEdit(item.edit);
    }
    const command = isRecord(item.command)
      ? getString(item.command.command)
      : getString(item.command);
    if (command !== undefined) {
      action.command = command;
    }
    actions.push(action);
  }
  return actions;
}

function parseSignature(value: unknown): SignatureInformation | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const label = getString(value.label);
  if (label === undefined) {
    return undefined;
  }
  const parameters: string[] = [];
  if (Array.isArray(value.parameters)) {
    for (const parameter of value.parameters) {
      if (!isRecord(parameter)) {
        continue;
      }
      const parameterLabel = parameter.label;
      if (typeof parameterLabel === 'string') {
        parameters.push(parameterLabel);
      } else if (
        Array.isArray(parameterLabel) &&
        parameterLabel.length === 2 &&
        typeof parameterLabel[0] === 'number' &&
        typeof parameterLabel[1] === 'number'
      ) {
        // [start, end) offsets into the signature label
        parameters.push(label.slice(parameterLabel[0], parameterLabel[1]));
      }
    }
  }
  const signature: SignatureInformation = { label, parameters };
  const documentation = parseDocumentation(value.documentation);
  if (documentation !== undefined) {
    signature.documentation = documentation;
  }
  return signature;
}

export function parseSignatureHelp(result: unknown): SignatureHelp | undefined {
  if (!isRecord(result) || !Array.isArray(result.signatures)) {
    return undefined;
  }
  const signatures: SignatureInformation[] = [];
  for (const item of result.signatures) {
    const signature = parseSignature(item);
    if (signature) {
      signatures.push(signature);
    }
  }
  return {
    signatures,
    activeSignature: getCount(result.activeSignature) ?? 0,
    activeParameter: getCount(result.activeParameter) ?? 0,
  };
}
