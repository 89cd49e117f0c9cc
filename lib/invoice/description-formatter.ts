/**
 * Renders item lists hidden in prose as numbered lines.
 *
 * "Web development, Logo design, Content creation" becomes
 *
 * ```
 * 1. Web development
 * 2. Logo design
 * 3. Content creation
 * ```
 *
 * Text that does not split into at least two items is returned as-is.
 *
 * @module description-formatter
 */

/** Tried in this order; on equal item counts the earlier separator wins. */
export const LIST_SEPARATORS = ["\n", ";", ",", "|", "•", "-", "*"] as const;

const LEADING_NUMBER = /^\d+[.)-]+\s*/;
const LEADING_BULLET = /^[•*-]\s*/;

function splitItems(text: string, separator: string): string[] {
    return text
        .split(separator)
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
}

function pickSeparator(text: string): string | null {
    let best: string | null = null;
    let bestCount = 1;

    for (const separator of LIST_SEPARATORS) {
        if (!text.includes(separator)) {
            continue;
        }
        const count = splitItems(text, separator).length;
        if (count > bestCount) {
            bestCount = count;
            best = separator;
        }
    }

    return best;
}

const INNER_WHITESPACE = /\s+/g;

// Items never keep line breaks, so a numbered list always re-splits on "\n".
function cleanItem(item: string): string {
    return item
        .replace(INNER_WHITESPACE, " ")
        .replace(LEADING_NUMBER, "")
        .trim()
        .replace(LEADING_BULLET, "")
        .trim();
}

export function formatDescription(text: string): string {
    if (!text) {
        return text;
    }

    const separator = pickSeparator(text);
    if (separator === null) {
        return text;
    }

    const items = splitItems(text, separator)
        .map(cleanItem)
        .filter((item) => item.length > 0);

    if (items.length < 2) {
        return text;
    }

    return items.map((item, index) => `${index + 1}. ${item}`).join("\n");
}
