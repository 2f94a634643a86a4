/**
 * Command module contract
 */
import type { Command } from "commander";

/**
 * A group of subcommands that attaches itself to the root program
 */
export interface CommandModule {
	register(program: Command): void;
}
