export type ExpandArgs = Record<string, unknown>;

const HTML_ESCAPES: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
    "'": "&#39;",
};

export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function stringify(value: unknown): string {
    return typeof value === "string" ? value : String(value);
}

function isAttributeMap(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function textAnchor(attributes: Record<string, unknown>, text: string): string {
    const rendered = Object.keys(attributes)
        .sort()
        .map((key) => `${key}="${escapeHtml(stringify(attributes[key]))}"`)
        .join(" ");
    return `<a ${rendered}>${escapeHtml(text)}</a>`;
}

/**
 * Expands `{name}` placeholders and `{href|text}` links in a message.
 * Placeholders without a matching argument are left as written.
 */
export function expand(template: string, args: ExpandArgs = {}): string {
    if (!template) {
        return "";
    }

    const keys = Object.keys(args);
    if (keys.length === 0) {
        return template;
    }

    const names = keys.map(escapeRegExp).join("|");
    const linksRegex = new RegExp(`\\{(${names})\\|(.*?)\\}`, "g");
    const namesRegex = new RegExp(`\\{(${names})\\}`, "g");

    return template
        .replace(linksRegex, (_match, hrefKey: string, textKey: string) => {
            const href = args[hrefKey];
            if (href === undefined) {
                return `{${hrefKey}|${textKey}}`;
            }
            const text = textKey in args ? stringify(args[textKey]) : textKey;
            return textAnchor(isAttributeMap(href) ? href : { href }, text);
        })
        .replace(namesRegex, (match, key: string) =>
            args[key] === undefined ? match : stringify(args[key])
        );
}

/** Marks a message for translation; no catalogs are loaded, so the source text is expanded. */
export function l(template: string, args?: ExpandArgs): string {
    return expand(template, args);
}
