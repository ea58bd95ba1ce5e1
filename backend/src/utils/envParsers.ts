/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is
 * empty or not a number.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    if (typeof value !== "string" || value.trim().length === 0) {
        return fallback;
    }
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export function isEnvFlagEnabled(value: string | undefined): boolean {
    return value?.trim().toLowerCase() === "true";
}

export function parseEnvCsv(value: string | undefined): string[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    return value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}
