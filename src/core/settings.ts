import { z } from "zod";
import { InvalidSettingValueError } from "./InvalidSettingValueError";
import { setDebugSymfile, showDebugSymfile } from "./symfileDebug";

const SETTING_NAME = "debug symfile";

export const SYMFILE_TRACE_DEBUG_ENV_VAR = "SYMFILE_TRACE_DEBUG";

/**
 * Boolean setting values, any prefix of a spelling is accepted.
 * The spellings are tried in order: "o" is "on".
 * An empty value means "on".
 */
export function tryParseBooleanSetting(text: string): boolean | undefined {
    const value = text.trim();

    if (value === "") {
        return true;
    }

    for (const [spelling, isOn] of [
        ["on", true],
        ["1", true],
        ["yes", true],
        ["enable", true],
        ["off", false],
        ["0", false],
        ["no", false],
        ["disable", false]
    ] as const) {
        if (spelling.startsWith(value)) {
            return isOn;
        }
    }

    return undefined;
}

export function parseBooleanSetting(params: { settingName: string; text: string }): boolean {
    const { settingName, text } = params;

    const value = tryParseBooleanSetting(text);

    if (value === undefined) {
        throw new InvalidSettingValueError({ settingName, value: text });
    }

    return value;
}

/** `set debug symfile <text>` */
export function setDebugSymfileCommand(text: string): void {
    setDebugSymfile(parseBooleanSetting({ settingName: SETTING_NAME, text }));
}

/** `show debug symfile` */
export function showDebugSymfileCommand(): string {
    return showDebugSymfile();
}

export type SymfileTraceConfig = {
    debugSymfile: boolean;
};

const zSymfileTraceEnv = z.object({
    [SYMFILE_TRACE_DEBUG_ENV_VAR]: z
        .string()
        .optional()
        .transform((value, ctx) => {
            if (value === undefined || value.trim() === "") {
                return false;
            }

            const isOn = tryParseBooleanSetting(value);

            if (isOn === undefined) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `"on" or "off" expected, got "${value}"`
                });
                return z.NEVER;
            }

            return isOn;
        })
});

export function loadSymfileTraceConfig(
    env: Record<string, string | undefined> = process.env
): SymfileTraceConfig {
    const result = zSymfileTraceEnv.safeParse(env);

    if (!result.success) {
        throw new InvalidSettingValueError({
            settingName: SYMFILE_TRACE_DEBUG_ENV_VAR,
            value: env[SYMFILE_TRACE_DEBUG_ENV_VAR] ?? ""
        });
    }

    return { debugSymfile: result.data[SYMFILE_TRACE_DEBUG_ENV_VAR] };
}

export function applySymfileTraceConfig(config: SymfileTraceConfig): void {
    setDebugSymfile(config.debugSymfile);
}
