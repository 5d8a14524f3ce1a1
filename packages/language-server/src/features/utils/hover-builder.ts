/**
 * Hover Content Builder
 *
 * Renders analyzer tooltips as markdown.
 */

import type { ToolTip } from '@quill-lsp/analyzer-bridge';

/**
 * Signature as a code block, then documentation, then the footer in italics.
 */
export function buildHoverContent(tip: ToolTip): string {
    const parts: string[] = [];
    if (tip.signature.trim().length > 0) {
        parts.push('```quill', tip.signature, '```');
    }
    const documentation = tip.documentation.trim();
    if (documentation.length > 0) {
        if (parts.length > 0) {
            parts.push('');
        }
        parts.push(documentation);
    }
    const footer = tip.footer.trim();
    if (footer.length > 0) {
        if (parts.length > 0) {
            parts.push('');
        }
        parts.push(`*${footer}*`);
    }
    return parts.join('\n');
}
