/**
 * MCP Server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { describeProfile, profileShape, rankDocuments, rankDocumentsShape } from "./tools";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

const server = new McpServer({
    name: "persona_rank",
    version: "1.0.0",
});

server.tool(
    "persona_rank_documents",
    `Rank the sections of local documents by how relevant they are to a reader and their task, then return refined excerpts of the best sections.

WHEN TO USE:
- A user has a folder of reports, papers or notes and a specific reader in mind
- "Which parts of these documents matter for a <role> who needs to <task>?"

INPUTS:
- persona: who is reading (role, seniority, field)
- job: what they need to get done
- paths: files or directories (.html, .txt, .md, or .json section records)

RETURNS: JSON with metadata, extracted_sections (ranked, with scores and page numbers) and subsection_analysis (refined text per top section).`,
    rankDocumentsShape,
    async (input) => rankDocuments(input)
);

server.tool(
    "persona_profile",
    `Show how a persona and job description are interpreted: detected role, technical level, domain tags, weighted keywords and job objectives. Useful for checking inputs before ranking.`,
    profileShape,
    async (input) => describeProfile(input)
);

async function main() {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.log("persona_rank MCP server listening on stdio");
}

main().catch((error) => {
    logger.error(`Fatal error: ${error}`);
    process.exit(1);
});
