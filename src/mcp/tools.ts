import type { DocumentLoader } from "../types";
import { extractFromFile } from "../pipeline";
import { loadConfig } from "../config";
import { processDirectory, formatBatchReport } from "../batch/batch";
import { serializeResult } from "../output/outline-json";

export interface ToolDeps {
    loader?: DocumentLoader;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

export interface BatchToolArgs {
    inputDir?: string;
    outputDir?: string;
    writeEmpty?: boolean;
}

/**
 * Outline JSON for one PDF. A document that fails to load yields the
 * untitled, empty outline plus an error line.
 */
export async function extractOutlineTool(path: string, deps: ToolDeps = {}): Promise<string> {
    const result = await extractFromFile(path, {
        ...(deps.loader && { loader: deps.loader }),
    });

    const json = serializeResult(result).trimEnd();
    if (result.error !== undefined) {
        return `${json}\n\nError: ${result.error}`;
    }
    return json;
}

export async function batchTool(args: BatchToolArgs, deps: ToolDeps = {}): Promise<string> {
    const config = loadConfig(deps.env ?? process.env, {
        ...(args.inputDir !== undefined && { inputDir: args.inputDir }),
        ...(args.outputDir !== undefined && { outputDir: args.outputDir }),
        ...(args.writeEmpty !== undefined && { writeEmpty: args.writeEmpty }),
    }, deps.cwd ?? process.cwd());

    const report = await processDirectory({
        ...config,
        ...(deps.loader && { loader: deps.loader }),
    });
    return formatBatchReport(report);
}
