#!/usr/bin/env node
/**
 * cadgraph CLI entry point.
 *
 * Extracts CAD design snapshots into a Neo4j property graph.
 */

import process from 'process';
import { errorMessage } from '../src/errors.js';
import { parseLoadOptions, runLoad, printLoadHelp } from './commands/load.js';
import { parseTransformOptions, runTransform, printTransformHelp } from './commands/transform.js';
import { parseSchemaOptions, runSchema, printSchemaHelp } from './commands/schema.js';
import { VERSION } from './version.js';

function printRootHelp(): void {
  console.log(`cadgraph - CAD design graph loader

Usage:
  cadgraph load <snapshot.json>   Extract a snapshot and load it into Neo4j
  cadgraph transform              Re-derive timeline and adjacency relationships
  cadgraph schema                 Create constraints and indexes
  cadgraph help <command>         Show help for a command

Options:
  -h, --help       Show this help
  -v, --version    Show version

Configuration is read from ./cadgraph.yaml when present. Neo4j credentials
default to NEO4J_URI, NEO4J_USERNAME, NEO4J_PASSWORD and NEO4J_DATABASE.

Examples:
  cadgraph schema
  cadgraph load ./bracket.json --verbose
  cadgraph load ./bracket.json --dry-run
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printRootHelp();
    return;
  }

  const [command, ...rest] = args;

  try {
    switch (command) {
      case '-h':
      case '--help':
        printRootHelp();
        return;

      case '-v':
      case '--version':
        console.log(VERSION);
        return;

      case 'help':
        switch (rest[0]) {
          case 'load':
            printLoadHelp();
            break;
          case 'transform':
            printTransformHelp();
            break;
          case 'schema':
            printSchemaHelp();
            break;
          default:
            printRootHelp();
        }
        return;

      case 'load':
        await runLoad(parseLoadOptions(rest));
        return;

      case 'transform':
        await runTransform(parseTransformOptions(rest));
        return;

      case 'schema':
        await runSchema(parseSchemaOptions(rest));
        return;

      default:
        console.error(`Unknown command "${command}".`);
        printRootHelp();
        process.exitCode = 1;
        return;
    }
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error('Unexpected error:', error instanceof Error ? error.stack || error.message : error);
  process.exitCode = 1;
});
