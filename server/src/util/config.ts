import { Connection } from 'vscode-languageserver';

/** Client configuration section read by the server */
export const CONFIG_SECTION = 'dlens';

export interface ServerSettings {
    /** extra directories searched for imported modules */
    includePaths: string[];
    /** milliseconds between the last edit and lexical diagnostics */
    diagnosticsDelay: number;
}

export const defaultSettings: ServerSettings = {
    includePaths: [],
    diagnosticsDelay: 300
};

/**
 * Settings from whatever the client returned for the section. Unknown keys
 * are ignored and invalid values fall back to the defaults.
 */
export function parseSettings(raw: unknown): ServerSettings {
    if (typeof raw !== 'object' || raw === null) return { ...defaultSettings, includePaths: [] };

    const includePaths: unknown = 'includePaths' in raw ? raw.includePaths : undefined;
    const delay: unknown = 'diagnosticsDelay' in raw ? raw.diagnosticsDelay : undefined;
    return {
        includePaths: Array.isArray(includePaths)
            ? includePaths.filter((p: unknown): p is string => typeof p === 'string' && p.length > 0)
            : [],
        diagnosticsDelay: typeof delay === 'number' && Number.isFinite(delay) && delay >= 0
            ? delay
            : defaultSettings.diagnosticsDelay
    };
}

export async function getConfiguration(connection: Connection): Promise<ServerSettings> {
    try {
        const raw: unknown = await connection.workspace.getConfiguration(CONFIG_SECTION);
        return parseSettings(raw);
    } catch (err) {
        console.warn(`Could not read '${CONFIG_SECTION}' settings, using defaults: ${String(err)}`);
        return parseSettings(undefined);
    }
}
