import { Command } from "commander"
import { type AnalyzeOptions, runAnalyze } from "./analyze"
import { configCommand } from "./commands/config"
import { parsePositiveNumber } from "./utils/args"
import { formatError } from "./utils/output"

const program = new Command()
	.name("podplan")
	.description(
		"Derive container dependencies and a phased migration plan from a runtime inventory",
	)
	.version("0.1.0")

program
	.command("analyze", { isDefault: true })
	.description("Resolve dependencies and print the migration plan")
	.argument("[inventory]", "Inventory snapshot JSON (default: compose files only)")
	.option("-c, --compose <files...>", "Docker Compose files (default: detected in cwd)")
	.option("-p, --project <name>", "Compose project name (default: directory name)")
	.option("-o, --output <file>", "Write the JSON report to a file")
	.option("--json", "Print the JSON report instead of the summary")
	.option(
		"--minutes-per-container <n>",
		"Estimated minutes to migrate one container",
		parsePositiveNumber,
	)
	.option(
		"--complexity-multiplier <n>",
		"Multiplier for containers with volume or environment dependencies",
		parsePositiveNumber,
	)
	.option("--max-cycle-paths <n>", "Cap on paths explored while finding cycles", parsePositiveNumber)
	.option(
		"--disable <extractors...>",
		"Extractors to skip (compose, links, network, volume, environment)",
	)
	.option("-v, --verbose", "Show detailed output")
	.action(async (inventory: string | undefined, options: AnalyzeOptions) => {
		try {
			await runAnalyze(inventory, options)
		} catch (error) {
			console.error(formatError(error))
			process.exitCode = 1
		}
	})

program.addCommand(configCommand)

program.parseAsync().catch((error: unknown) => {
	console.error(error)
	process.exitCode = 1
})
