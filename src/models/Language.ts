/**
 * Languages whose manifests the scanner recognizes
 */
export const LANGUAGES = ['go', 'nodejs', 'java', 'python'] as const;

export type Language = (typeof LANGUAGES)[number];

export function isLanguage(value: string): value is Language {
    return (LANGUAGES as readonly string[]).includes(value);
}
