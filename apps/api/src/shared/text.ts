/**
 * Upper-cases the first letter of every run of letters and lower-cases the
 * rest, so "sea-floor debris" becomes "Sea-Floor Debris".
 */
export function toTitleCase(text: string): string {
    return text.replace(/\p{L}+/gu, word => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

export function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

// Break point after a hyphen joining two word characters, as in "top-left"
const HYPHEN_BREAK = /(?<=\w-)(?=\w)/;

/**
 * Greedy word wrap at a fixed column count. Hyphenated words may break after
 * the hyphen. Words longer than the width are split across lines; runs of
 * whitespace collapse to single spaces.
 */
export function wrapText(text: string, width: number): string[] {
    const lines: string[] = [];
    let current = '';

    const place = (piece: string, separator: string) => {
        let rest = piece;
        while (rest) {
            const candidate = current ? `${current}${separator}${rest}` : rest;
            if (candidate.length <= width) {
                current = candidate;
                return;
            }

            const room = current ? width - current.length - separator.length : width;
            if (rest.length > width && room > 0) {
                const head = rest.slice(0, room);
                lines.push(current ? `${current}${separator}${head}` : head);
                rest = rest.slice(room);
            } else {
                lines.push(current);
            }
            current = '';
        }
    };

    for (const word of text.trim().split(/\s+/).filter(Boolean)) {
        word.split(HYPHEN_BREAK).forEach((piece, index) => place(piece, index === 0 ? ' ' : ''));
    }

    if (current) lines.push(current);
    return lines;
}
