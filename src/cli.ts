#!/usr/bin/env node

import { loadConfig, type ConfigOverrides } from "./config";
import { runBatch } from "./batch/batch";
import { extractFromFile } from "./pipeline";
import { formatOutline, serializeResult } from "./output/outline-json";
import { errorMessage } from "./utils/shared";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
pdf-outline - Title and heading outline extraction from PDF files

Detects headings from visual cues (font size, bold fonts, casing, numbered
prefixes, multilingual section keywords) and writes one JSON file per PDF:
  { "title": "...", "outline": [{ "text": "...", "page": 1, "level": "H1" }] }

COMMANDS:
  batch [options]        Process every PDF in the input directory (default)
    --input, -i <dir>      Input directory (default: $PDF_OUTLINE_INPUT_DIR or ./input)
    --output, -o <dir>     Output directory (default: $PDF_OUTLINE_OUTPUT_DIR or ./output)
    --write-empty          Also write JSON for PDFs with no headings
    --no-progress          Do not log page-by-page progress

  extract <file.pdf>     Print the outline of a single PDF
    --json                 Print JSON instead of an indented outline

  mcp                    Start the MCP server (called by MCP clients)
  help, --help           Show this help message

GLOBAL OPTIONS:
  --debug                Log every detected heading
  --timing, -t           Show performance timing breakdown

EXAMPLES:
  pdf-outline                                 # ./input -> ./output
  pdf-outline batch -i pdfs -o outlines
  pdf-outline extract report.pdf --json
`;

interface ParsedArgs {
    command: string | undefined;
    positional: string[];
    overrides: ConfigOverrides;
    json: boolean;
    debug: boolean;
    timing: boolean;
}

function parseArgs(argv: string[]): ParsedArgs {
    // Filter out standalone "--" which npm passes through
    const args = argv.filter((a) => a !== "--");
    const parsed: ParsedArgs = {
        command: undefined,
        positional: [],
        overrides: {},
        json: false,
        debug: false,
        timing: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];
        if (arg === undefined) continue;

        if ((arg === "--input" || arg === "-i") && nextArg !== undefined) {
            parsed.overrides.inputDir = nextArg;
            i++;
        } else if ((arg === "--output" || arg === "-o") && nextArg !== undefined) {
            parsed.overrides.outputDir = nextArg;
            i++;
        } else if (arg === "--write-empty") {
            parsed.overrides.writeEmpty = true;
        } else if (arg === "--no-progress") {
            parsed.overrides.progress = false;
        } else if (arg === "--json") {
            parsed.json = true;
        } else if (arg === "--debug") {
            parsed.debug = true;
        } else if (arg === "--timing" || arg === "-t") {
            parsed.timing = true;
        } else if (arg === "--help" || arg === "-h") {
            parsed.command = "help";
        } else if (parsed.command === undefined && !arg.startsWith("-")) {
            parsed.command = arg;
        } else {
            parsed.positional.push(arg);
        }
    }

    return parsed;
}

async function runBatchCommand(args: ParsedArgs): Promise<void> {
    const config = loadConfig(process.env, args.overrides);
    const report = await runBatch(config);
    if (report.failed.length > 0) {
        process.exitCode = 1;
    }
}

async function runExtractCommand(args: ParsedArgs): Promise<void> {
    const file = args.positional[0];
    if (file === undefined) {
        logger.error("extract requires a PDF path");
        process.exit(1);
    }

    const result = await extractFromFile(file, {
        onPage: (page, total) => logger.debug(`page ${page}/${total}`),
    });

    console.log(args.json ? serializeResult(result).trimEnd() : formatOutline(result));
    if (result.error !== undefined) {
        process.exitCode = 1;
    }
}

async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));

    logger.setDebugEnabled(args.debug);
    if (args.timing) {
        logger.setTimingEnabled(true);
    }

    switch (args.command) {
        case undefined:
        case "batch": {
            await runBatchCommand(args);
            break;
        }

        case "extract": {
            await runExtractCommand(args);
            break;
        }

        case "mcp": {
            await import("./mcp/server");
            return;
        }

        case "help": {
            console.log(HELP_TEXT);
            return;
        }

        default: {
            console.log(`Unknown command: ${args.command}`);
            console.log("Run 'pdf-outline --help' for usage.\n");
            process.exit(1);
        }
    }

    if (args.timing) {
        logger.printTimings();
    }
}

main().catch((err) => {
    logger.error(`Unexpected error: ${errorMessage(err)}`);
    process.exit(1);
});
