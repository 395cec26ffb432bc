#!/usr/bin/env node

import { runProfile, runRank } from "./run";

const HELP_TEXT = `
persona-rank - Persona-driven document section ranking

Ranks the sections of a small document set by relevance to a reader (the
persona) and their task (the job to be done), then refines the top sections
into short excerpts. Also exposes the analysis as MCP tools.

COMMANDS:
  rank [options]     Rank document sections and print the JSON report
    --persona, -p <text>   Persona description (required unless --job is given)
    --job, -j <text>       Job-to-be-done description
    --documents, -d <path> File or directory to load (repeatable)
    --sections <file>      Pre-segmented JSON array of section records
    --top <n>              Sections to refine (default: 5, env PERSONA_RANK_TOP_K)
    --sentences <n>        Sentences per refined excerpt (default: 5)
    --output, -o <file>    Write the JSON report to a file
    --format json|text     Output format (default: json)
    --debug                Log ranking diagnostics
    --timing, -t           Log a timing breakdown

  profile [options]  Print the persona profile built from --persona and --job

  mcp                Start the MCP server (called by MCP clients)
  help, --help       Show this help message

EXAMPLES:
  persona-rank rank -p "PhD researcher in computational biology" \\
    -j "Prepare a literature review on graph neural networks" -d ./papers
  persona-rank rank -p "Investment analyst" -j "Compare revenue trends" \\
    --sections sections.json --format text
  persona-rank profile -p "Undergraduate chemistry student" -j "Study reaction kinetics"
`;

async function main(): Promise<void> {
    const args = process.argv.slice(2).filter((a) => a !== "--");
    const command = args[0];

    switch (command) {
        case "rank": {
            process.exitCode = runRank(args.slice(1));
            break;
        }

        case "profile": {
            process.exitCode = runProfile(args.slice(1));
            break;
        }

        case "mcp": {
            await import("./mcp/server");
            break;
        }

        case "--help":
        case "-h":
        case "help":
        case undefined: {
            console.log(HELP_TEXT);
            break;
        }

        default: {
            console.error(`Unknown command: ${command}`);
            console.error("Run 'persona-rank --help' for usage.\n");
            process.exit(1);
        }
    }
}

main().catch((err) => {
    console.error(`Unexpected error: ${err}`);
    process.exit(1);
});
