import {
	type ResolverConfigInput,
	configFromEnv,
	disabledExtractors,
	getConfigPath,
	loadConfig,
	loadResolverConfig,
	resolveConfig,
	saveConfig,
} from "@podplan/core"
import { Command, InvalidArgumentError } from "commander"
import { parsePositiveNumber } from "../utils/args"
import { formatError } from "../utils/output"

export const configCommand = new Command("config")
	.description("Manage podplan configuration")

const NUMERIC_KEYS = ["minutesPerContainer", "complexityMultiplier", "maxCyclePaths"] as const
type NumericKey = (typeof NUMERIC_KEYS)[number]

function isNumericKey(key: string): key is NumericKey {
	return NUMERIC_KEYS.some((k) => k === key)
}

/**
 * Return `config` with one setting changed, validated as a whole
 */
export function applySetting(
	config: ResolverConfigInput,
	key: string,
	value: string,
): ResolverConfigInput {
	let next: ResolverConfigInput
	if (isNumericKey(key)) {
		next = { ...config, [key]: parsePositiveNumber(value) }
	} else if (key === "disabledExtractors") {
		next = { ...config, extractors: disabledExtractors(value.split(",")) }
	} else if (key === "ignoredNetworks") {
		next = { ...config, ignoredNetworks: value.split(",").map((n) => n.trim()).filter(Boolean) }
	} else {
		throw new InvalidArgumentError(`Unknown config key: ${key}`)
	}
	resolveConfig(next)
	return next
}

function runAction(action: () => void): void {
	try {
		action()
	} catch (error) {
		console.error(formatError(error))
		process.exitCode = 1
	}
}

configCommand
	.command("set <key> <value>")
	.description(`Set ${NUMERIC_KEYS.join(", ")} or disabledExtractors (comma list)`)
	.action((key: string, value: string) =>
		runAction(() => {
			saveConfig(applySetting(loadConfig(), key, value))
			console.log(`Saved ${key} to ${getConfigPath()}`)
		}),
	)

configCommand
	.command("show")
	.description("Show the effective configuration")
	.action(() =>
		runAction(() => {
			console.log(`Config file: ${getConfigPath()}\n`)
			const env = configFromEnv()
			if (Object.keys(env).length > 0) {
				console.log(`Environment overrides: ${Object.keys(env).join(", ")}\n`)
			}
			console.log(JSON.stringify(loadResolverConfig(), null, 2))
		}),
	)

configCommand
	.command("clear")
	.description("Remove all stored settings")
	.action(() => {
		saveConfig({})
		console.log("Configuration cleared")
	})

configCommand
	.command("path")
	.description("Show the config file path")
	.action(() => {
		console.log(getConfigPath())
	})
