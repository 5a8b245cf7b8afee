import fs from "fs";

/** Maps a provider's numeric weather code to a free-form description. */
export type WeatherCodebook = ReadonlyMap<number, string>;

function log(message: string) {
    console.log(`[WeatherCodebook] ${message}`);
}

function warn(message: string) {
    console.warn(`[WeatherCodebook] ${message}`);
}

/**
 * Parses a two column CSV table with a `code,description` header. Rows without a numeric
 * code or without a description are skipped.
 */
export function parseWeatherCodebook(content: string): Map<number, string> {
    const codebook = new Map<number, string>();
    const rows = content.split(/\r?\n/).map(row => row.trim()).filter(row => row.length > 0);

    // Header
    rows.shift();

    for (const row of rows) {
        const separator = row.indexOf(',');
        if (separator < 0) {
            warn(`Skipping row without separator: "${row}"`);
            continue;
        }

        const codeField = row.slice(0, separator).trim();
        const code = codeField.length > 0 ? Number(codeField) : NaN;
        const description = row.slice(separator + 1).trim().replace(/^"(.*)"$/, '$1');

        if (!Number.isInteger(code) || description.length === 0) {
            warn(`Skipping invalid row: "${row}"`);
            continue;
        }

        codebook.set(code, description);
    }

    return codebook;
}

/**
 * Loads the codebook from disk. A missing or unreadable file is not fatal: an empty
 * codebook is returned and every code lookup falls through to Unrecognized.
 */
export function loadWeatherCodebook(filePath: string): WeatherCodebook {
    try {
        const codebook = parseWeatherCodebook(fs.readFileSync(filePath, "utf8"));
        log(`Loaded ${codebook.size} weather codes from ${filePath}`);
        return codebook;
    } catch (err) {
        console.error(`[WeatherCodebook] Could not read weather codes file ${filePath}:`, err);
        return new Map();
    }
}
