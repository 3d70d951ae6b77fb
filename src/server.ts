#!/usr/bin/env node
/**
 * Tally Language Server
 *
 * Diagnostics, completion and hover for Tally scripts and queries.
 *
 * Entry point only: creates the connection and registers the handlers.
 * - core.ts      - document store and request pipelines
 * - handlers.ts  - LSP event and request handlers
 * - settings.ts  - command-line flags and initializationOptions
 * - tally/       - the Tally lexer, parser, checker and function library
 */

import { createConnection, ProposedFeatures } from 'vscode-languageserver/node';
import { createServerContext, registerHandlers } from './handlers';

const connection = createConnection(ProposedFeatures.all);
const ctx = createServerContext(connection, process.argv.slice(2));

registerHandlers(ctx);

connection.listen();
