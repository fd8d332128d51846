import { resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors";

export interface AppConfig {
    inputDir: string;
    outputDir: string;
    /** Write a sidecar even when no heading was found */
    writeEmpty: boolean;
    /** Log page-by-page progress while extracting */
    progress: boolean;
}

export type ConfigOverrides = Partial<AppConfig>;

export const DEFAULT_CONFIG: AppConfig = {
    inputDir: "input",
    outputDir: "output",
    writeEmpty: false,
    progress: true,
};

const BooleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform(v => v === "true" || v === "1");

const EnvSchema = z.object({
    PDF_OUTLINE_INPUT_DIR: z.string().min(1).optional(),
    PDF_OUTLINE_OUTPUT_DIR: z.string().min(1).optional(),
    PDF_OUTLINE_WRITE_EMPTY: BooleanFlag.optional(),
    PDF_OUTLINE_PROGRESS: BooleanFlag.optional(),
});

/**
 * Resolve configuration: defaults, then environment, then explicit overrides.
 * Directories are resolved against cwd.
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: ConfigOverrides = {},
    cwd: string = process.cwd()
): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw ConfigError.fromZod(parsed.error);
    }
    const fromEnv = parsed.data;

    const inputDir = overrides.inputDir ?? fromEnv.PDF_OUTLINE_INPUT_DIR ?? DEFAULT_CONFIG.inputDir;
    const outputDir = overrides.outputDir ?? fromEnv.PDF_OUTLINE_OUTPUT_DIR ?? DEFAULT_CONFIG.outputDir;

    return {
        inputDir: resolve(cwd, inputDir),
        outputDir: resolve(cwd, outputDir),
        writeEmpty: overrides.writeEmpty ?? fromEnv.PDF_OUTLINE_WRITE_EMPTY ?? DEFAULT_CONFIG.writeEmpty,
        progress: overrides.progress ?? fromEnv.PDF_OUTLINE_PROGRESS ?? DEFAULT_CONFIG.progress,
    };
}
