#!/usr/bin/env node

/**
 * rankblend - Probabilistic interleaving for click-based ranker comparison
 *
 * Entry point for the command-line interface.
 */

import { config } from "dotenv";

// Load environment variables from .env file
config();

const args = process.argv.slice(2);

import("./cli.js")
	.then(async (module) => {
		process.exitCode = await module.runCli(args);
	})
	.catch((error: unknown) => {
		console.error(error);
		process.exitCode = 1;
	});
