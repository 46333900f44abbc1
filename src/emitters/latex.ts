// ─────────────────────────────────────────────────────────────
// Proplogic  ·  LaTeX Export
// LaTeX source for propositions and the theorem catalog, and
// KaTeX rendering to HTML
// ─────────────────────────────────────────────────────────────

import katex from 'katex';
import { asBiconditional, asNegation, type Proposition } from '../core/ir';
import { requiredPostulates, THEOREMS, type TheoremEntry } from '../core/catalog';

export interface RenderOptions {
    displayMode: boolean;
}

export interface CatalogOptions {
    includePostulates: boolean;
}

const DEFAULT_RENDER: RenderOptions = { displayMode: false };
const DEFAULT_CATALOG: CatalogOptions = { includePostulates: true };

export function emitLatex(prop: Proposition): string {
    switch (prop.tag) {
        case 'Bool': return prop.value ? '\\top' : '\\bot';
        case 'Atom': return prop.name;
        case 'And': {
            const iff = asBiconditional(prop);
            if (iff) return `(${emitLatex(iff[0])} \\leftrightarrow ${emitLatex(iff[1])})`;
            return `(${emitLatex(prop.left)} \\land ${emitLatex(prop.right)})`;
        }
        case 'Or': return `(${emitLatex(prop.left)} \\lor ${emitLatex(prop.right)})`;
        case 'Imply': {
            const negated = asNegation(prop);
            if (negated) return `\\lnot ${emitLatex(negated)}`;
            return `(${emitLatex(prop.premise)} \\to ${emitLatex(prop.conclusion)})`;
        }
    }
}

export function renderLatex(prop: Proposition, options: Partial<RenderOptions> = {}): string {
    const opts = { ...DEFAULT_RENDER, ...options };
    return katex.renderToString(emitLatex(prop), {
        throwOnError: false,
        displayMode: opts.displayMode,
    });
}

export function exportCatalogLatex(
    entries: readonly TheoremEntry[] = THEOREMS,
    options: Partial<CatalogOptions> = {},
): string {
    const opts = { ...DEFAULT_CATALOG, ...options };
    const lines: string[] = [`% Theorem catalog: ${entries.length} entries`];

    for (const entry of entries) {
        lines.push('');
        lines.push(`\\begin{theorem}[${entry.name}]`);
        lines.push(`  $${emitLatex(entry.statement)}$`);
        lines.push('\\end{theorem}');
        if (opts.includePostulates) {
            const uses = requiredPostulates(entry.name);
            lines.push(`% uses: ${uses.join(', ') || '(none)'}`);
        }
    }

    return lines.join('\n') + '\n';
}
