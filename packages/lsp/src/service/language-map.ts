import { basename, extname } from 'node:path';

import { z } from 'zod';

import languageMapData from './language-map.json' with { type: 'json' };

const LanguageMapSchema = z.object({
  extensions: z.record(z.string(), z.string()),
  fileNames: z.record(z.string(), z.string()),
});

const languageMap = LanguageMapSchema.parse(languageMapData);

const extensionToLanguageId: ReadonlyMap<string, string> = new Map(
  Object.entries(languageMap.extensions),
);

const fileNameToLanguageId: ReadonlyMap<string, string> = new Map(
  Object.entries(languageMap.fileNames),
);

const languageIdToExtensions: ReadonlyMap<string, readonly string[]> = new Map(
  (() => {
    const grouped = new Map<string, string[]>();
    for (const [extension, languageId] of extensionToLanguageId.entries()) {
      const extensions = grouped.get(languageId);
      if (extensions) {
        extensions.push(extension);
      } else {
        grouped.set(languageId, [extension]);
      }
    }

    return Array.from(grouped.entries()).map(
      ([languageId, extensions]) =>
        [languageId, Object.freeze([...extensions])] as const,
    );
  })(),
);

/** Looks up an extension, with or without its leading dot. */
export function getLanguageId(extension: string): string | undefined {
  if (!extension) {
    return undefined;
  }

  const normalized = extension.toLowerCase();
  return extensionToLanguageId.get(
    normalized.startsWith('.') ? normalized : `.${normalized}`,
  );
}

/**
 * Language identifier for a file, from its whole name first (`Dockerfile`,
 * `CMakeLists.txt`) and then its extension. Matching ignores case.
 */
export function detectLanguage(filePath: string): string | undefined {
  const name = basename(filePath).toLowerCase();
  const byName = fileNameToLanguageId.get(name);
  if (byName) {
    return byName;
  }
  const extension = extname(name);
  return extension ? getLanguageId(extension) : undefined;
}

export function getExtensionsForLanguage(
  languageId: string,
): readonly string[] {
  return languageIdToExtensions.get(languageId) ?? [];
}

export function knownLanguages(): string[] {
  return [...languageIdToExtensions.keys()].sort();
}
