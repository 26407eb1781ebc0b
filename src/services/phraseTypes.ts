/**
 * A phrase entry is a single template, a pool of interchangeable templates,
 * or templates keyed by a variant such as the concept kind.
 */
export type PhraseEntry = string | string[] | Record<string, string>;

export type PhraseGroup = Record<string, PhraseEntry>;

export type PhraseBook = Record<string, PhraseGroup>;

export type PhraseContext = Record<string, string | number>;
