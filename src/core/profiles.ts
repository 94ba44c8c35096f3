/**
 * Language Profile Registry
 *
 * Profiles are data, not behavior: each one lists the lexical rules that
 * delimit comments, docstrings and strings for a language. The extractor
 * and chunker never look at the language id, so supporting a new language
 * means adding an entry to languages.json.
 *
 * Nesting is declared per rule. Rust, Kotlin, Swift and Haskell block
 * comments (and their doc blocks) nest; C-family block comments do not.
 */

import * as path from 'path';
import { z } from 'zod';
import languageData from './languages.json';
import { LanguageProfile, LexicalRule } from './types';

const ruleSchema = z.object({
  kind: z.enum(['LineComment', 'BlockComment', 'Docstring', 'StringLiteral']),
  start: z.string().min(1),
  end: z.string().min(1).nullable(),
  nests: z.boolean().optional(),
  escape: z.string().length(1).optional(),
  singleLine: z.boolean().optional(),
  charLiteral: z.boolean().optional(),
});

const profileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  extensions: z.array(z.string().regex(/^\.[a-z0-9]+$/)).min(1),
  rules: z.array(ruleSchema).min(1),
});

const registrySchema = z.object({
  profiles: z.array(profileSchema),
});

function freezeProfile(profile: z.infer<typeof profileSchema>): LanguageProfile {
  const rules: LexicalRule[] = profile.rules.map(rule => Object.freeze({ ...rule }));
  return Object.freeze({
    id: profile.id,
    name: profile.name,
    extensions: Object.freeze([...profile.extensions]),
    rules: Object.freeze(rules),
  });
}

/**
 * Build an extension index over a list of profiles.
 * Throws if two profiles claim the same extension.
 */
export function buildRegistry(profiles: readonly LanguageProfile[]): ReadonlyMap<string, LanguageProfile> {
  const byExtension = new Map<string, LanguageProfile>();
  for (const profile of profiles) {
    for (const extension of profile.extensions) {
      const existing = byExtension.get(extension);
      if (existing) {
        throw new Error(`Extension ${extension} claimed by both "${existing.id}" and "${profile.id}"`);
      }
      byExtension.set(extension, profile);
    }
  }
  return byExtension;
}

/** All built-in profiles, validated once at load */
export const PROFILES: readonly LanguageProfile[] = Object.freeze(
  registrySchema.parse(languageData).profiles.map(freezeProfile)
);

const REGISTRY = buildRegistry(PROFILES);

/**
 * Look up the profile for a file extension (with or without the leading dot).
 * Returns null when the language is not supported.
 */
export function profileFor(extension: string): LanguageProfile | null {
  const normalized = extension.startsWith('.') ? extension.toLowerCase() : `.${extension.toLowerCase()}`;
  return REGISTRY.get(normalized) ?? null;
}

/**
 * Look up the profile for a file path by its extension
 */
export function profileForPath(filePath: string): LanguageProfile | null {
  const extension = path.extname(filePath);
  if (!extension) {
    return null;
  }
  return profileFor(extension);
}

/**
 * Every extension with a profile, sorted
 */
export function supportedExtensions(): string[] {
  return [...REGISTRY.keys()].sort();
}
