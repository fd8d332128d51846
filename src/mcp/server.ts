/**
 * MCP Server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { extractOutlineTool, batchTool } from "./tools";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

const server = new McpServer({
    name: "pdf_outline_mcp",
    version: "0.1.0",
});

server.tool(
    "pdf_outline_extract",
    `Extract the title and heading outline (H1/H2/H3 with page numbers) of a PDF file.

Headings are detected from visual cues: font size, bold fonts, casing, numbered prefixes
such as "1.2" and section keywords in several languages. The PDF's own bookmarks are not used.

RETURNS: JSON {"title": string, "outline": [{"text", "page", "level"}]}.`,
    {
        path: z.string().describe("Absolute path to a PDF file"),
    },
    async ({ path }) => {
        const text = await extractOutlineTool(path);
        return {
            content: [{ type: "text", text }],
        };
    }
);

server.tool(
    "pdf_outline_batch",
    `Extract outlines for every PDF in a directory and write one <name>.json per PDF.
PDFs without any detected heading are skipped unless writeEmpty is set.

RETURNS: A summary of processed, skipped and failed files.`,
    {
        inputDir: z.string().optional().describe("Directory containing PDFs (default: PDF_OUTLINE_INPUT_DIR or ./input)"),
        outputDir: z.string().optional().describe("Directory for JSON output (default: PDF_OUTLINE_OUTPUT_DIR or ./output)"),
        writeEmpty: z.boolean().optional().describe("Also write JSON for PDFs with no headings (default: false)"),
    },
    async ({ inputDir, outputDir, writeEmpty }) => {
        const text = await batchTool({
            ...(inputDir !== undefined && { inputDir }),
            ...(outputDir !== undefined && { outputDir }),
            ...(writeEmpty !== undefined && { writeEmpty }),
        });
        return {
            content: [{ type: "text", text }],
        };
    }
);

async function main() {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.log("pdf-outline MCP server listening on stdio");
}

main().catch((error) => {
    logger.error(`Fatal error: ${error}`);
    process.exit(1);
});
