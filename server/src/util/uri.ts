import { URI } from 'vscode-uri';

export function normalizeUri(uri: string): string {
    const normalized = URI.parse(uri).toString();
    // Drive letters differ in case between the client and file scans on
    // Windows; lowercase file:///c%3A/... so one file has one cache key.
    if (/^file:\/\/\/[a-z]%3A/i.test(normalized)) {
        return normalized.toLowerCase();
    }
    return normalized;
}

/** Filesystem path of a file: URI, undefined for other schemes */
export function uriToPath(uri: string): string | undefined {
    const parsed = URI.parse(uri);
    return parsed.scheme === 'file' ? parsed.fsPath : undefined;
}

export function pathToUri(fsPath: string): string {
    return URI.file(fsPath).toString();
}
