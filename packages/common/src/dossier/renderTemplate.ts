import { isDossierPlaceholder, type DossierRenderContext } from './renderContext.js';

// Single-brace tag: {name}, {first_connection}. CSS blocks like `{ margin: 0 }` never match.
const TAG_RE = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g;

export interface RenderedDossier {
    html: string;
    /** Tags left in the output because no context key matched them, in first-seen order. */
    unresolved: string[];
}

/**
 * Substitutes every recognized `{tag}` in one pass over the template.
 * Substituted values are not scanned again, so a field containing "{name}" stays literal.
 */
export function renderTemplate(template: string, context: DossierRenderContext): RenderedDossier {
    const unresolved = new Set<string>();

    const html = template.replace(TAG_RE, (match: string, tag: string) => {
        if (isDossierPlaceholder(tag)) {
            return context[tag];
        }
        unresolved.add(match);
        return match;
    });

    return { html, unresolved: Array.from(unresolved) };
}

export function extractTemplateTags(template: string): string[] {
    const tags = new Set<string>();
    for (const match of template.matchAll(TAG_RE)) {
        tags.add(match[1] ?? '');
    }
    return Array.from(tags).sort();
}
