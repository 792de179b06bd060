import reservedWords from './reserved-words.json' with { type: 'json' };

/**
 * Reserved keywords per dialect, uppercase. `common` applies to every dialect.
 */
export const RESERVED_WORDS: Readonly<Record<keyof typeof reservedWords, readonly string[]>> = reservedWords;
