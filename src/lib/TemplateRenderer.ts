import { TemplateError } from './errors';

/** Every placeholder a template may reference. */
export const PLACEHOLDERS = ['project_name'] as const;

export type Placeholder = typeof PLACEHOLDERS[number];

export type PlaceholderValues = Partial<Record<Placeholder, string>>;

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

function isPlaceholder(name: string): name is Placeholder {
    return PLACEHOLDERS.some(p => p === name);
}

/**
 * Lists the placeholder names referenced by `text`, in order of first appearance.
 */
export function findPlaceholders(text: string): string[] {
    const names: string[] = [];
    for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
        if (!names.includes(match[1])) {
            names.push(match[1]);
        }
    }
    return names;
}

/**
 * Substitutes every `{{ name }}` token in `text`. A token outside PLACEHOLDERS, or one
 * with no value in `values`, fails the whole render.
 *
 * @param templatePath Used only for error reporting.
 */
export function renderTemplate(templatePath: string, text: string, values: PlaceholderValues): string {
    for (const name of findPlaceholders(text)) {
        if (!isPlaceholder(name)) {
            throw new TemplateError(templatePath, name, 'is not a known placeholder');
        }
        if (values[name] === undefined) {
            throw new TemplateError(templatePath, name, 'has no value');
        }
    }
    return text.replace(PLACEHOLDER_PATTERN, (_token, name: string) => {
        const value = isPlaceholder(name) ? values[name] : undefined;
        return value ?? '';
    });
}
