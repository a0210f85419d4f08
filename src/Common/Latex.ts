/**
 * Converts LaTeX-style markup to ROOT's TLatex flavour: math delimiters are dropped, backslash
 * commands become `#` commands and `~` becomes a plain space. Text without markup is unchanged.
 * @param text string - Label or title, e.g. `$\mu p_{T}$`
 * @returns string - Converted text, e.g. `#mu p_{T}`
 * @example
 * ToRootLatex('$\\mu p_{T}$ [GeV]'); // '#mu p_{T} [GeV]'
 */
export function ToRootLatex(text: string): string;
export function ToRootLatex(text: string | null): string | null;
export function ToRootLatex(text: string | null): string | null {
    if (text === null) {
        return null;
    }
    return text
        .replace(/\$/g, ``)
        .replace(/\\[,;]/g, ` `)
        .replace(/~/g, ` `)
        .replace(/\\/g, `#`);
}
