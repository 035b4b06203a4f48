import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { Language } from './Language.ts';

const catalogSchema = z.array(
  z.object({
    fullName: z.string().min(1),
    iso639: z.string().min(1),
  }),
);

const json: unknown = JSON.parse(readFileSync(new URL('./languages.json', import.meta.url), 'utf8'));

/** Every language supported by the service, excluding `Language.auto`. */
export const languagesSupported: readonly Language[] = Object.freeze(
  catalogSchema.parse(json).map(({ fullName, iso639 }) => new Language(fullName, iso639)),
);

/** Find a supported language by its full name, eg `English`. */
export function getLanguageByName(name: string): Language | undefined {
  const lower = name.toLowerCase();
  return languagesSupported.find((language) => language.fullName.toLowerCase() === lower);
}

/** Find a supported language by its ISO code, eg `en`. */
export function getLanguageByISO(iso: string): Language | undefined {
  const lower = iso.toLowerCase();
  return languagesSupported.find((language) => language.iso639.toLowerCase() === lower);
}

/** Whether the language is in the catalog. `Language.auto` is always supported. */
export function isLanguageSupported(language: Language): boolean {
  if (language.equals(Language.auto)) {
    return true;
  }

  return languagesSupported.some((supported) => supported.equals(language));
}
