#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import {
	checkout,
	configInit,
	configShow,
	install,
	list,
	rebuild,
	remove,
} from "./commands/index";

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(
	readFileSync(join(__dirname, "..", "package.json"), "utf-8"),
);
const version =
	typeof packageJson === "object" &&
	packageJson !== null &&
	"version" in packageJson &&
	typeof packageJson.version === "string"
		? packageJson.version
		: "0.0.0";

const program = new Command();

program
	.name("vcpm")
	.description("Install Lisp packages straight from version control")
	.version(version);

// =============================================================================
// Config commands
// =============================================================================

const configCmd = program
	.command("config")
	.description("Manage vcpm configuration");

configCmd
	.command("show")
	.description("Show resolved configuration")
	.action(async () => {
		await configShow();
	});

configCmd
	.command("init")
	.description("Create a .vcpmrc file in the current directory")
	.option("--registry <url>", "Registry URL override")
	.action(async (options) => {
		await configInit({
			registry: options.registry,
		});
	});

// =============================================================================
// Package commands
// =============================================================================

program
	.command("install <name-or-url>")
	.alias("i")
	.description(
		"Install a package from its repository (e.g., magit or https://example.com/foo.git)",
	)
	.option("--name <name>", "Package name to use instead of the derived one")
	.option("--rev <rev>", "Revision to check out instead of the upstream branch")
	.option("-y, --yes", "Overwrite an existing installation without asking")
	.action(async (nameOrUrl, options) => {
		await install(nameOrUrl, {
			name: options.name,
			rev: options.rev,
			yes: options.yes,
		});
	});

program
	.command("checkout <name-or-url> <dir>")
	.description("Clone a package's repository without installing it")
	.option("--rev <rev>", "Revision to check out")
	.action(async (nameOrUrl, dir, options) => {
		await checkout(nameOrUrl, dir, { rev: options.rev });
	});

program
	.command("rebuild <name>")
	.description("Regenerate the descriptor of an installed vc package")
	.action(async (name) => {
		await rebuild(name);
	});

program
	.command("remove <name>")
	.alias("rm")
	.description("Remove an installed vc package")
	.action(async (name) => {
		await remove(name);
	});

program
	.command("list")
	.alias("ls")
	.description("List installed packages")
	.option("--json", "Output as JSON")
	.action(async (options) => {
		await list({ json: options.json });
	});

program.parse();
