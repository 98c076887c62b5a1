import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";
import { DEFAULT_SIMILARITY_THRESHOLD } from "./types.js";

const CONFIG_DIRNAME = ".lookup";
const CONFIG_FILENAMES = ["lookup.json", "lookup.yaml", "lookup.yml"];
const THRESHOLD_ENV_KEY = "LOOKUP_SIMILARITY_THRESHOLD";

const LookupConfigFileSchema = Type.Object({
	threshold: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
});

type LookupConfigFile = Static<typeof LookupConfigFileSchema>;

type ThresholdSource = "default" | "config" | "env";

export interface LookupConfig {
	threshold: number;
}

export interface LookupConfigLoadOptions {
	cwd?: string;
	homeDir?: string;
	env?: NodeJS.ProcessEnv;
	explicitConfigPath?: string;
	warn?: (message: string) => void;
}

export interface ResolvedLookupConfig extends LookupConfig {
	sources: {
		threshold: ThresholdSource;
	};
	configPath?: string;
	warnings: string[];
}

export function loadLookupConfig(options: LookupConfigLoadOptions = {}): LookupConfig {
	const { threshold } = resolveLookupConfig(options);
	return { threshold };
}

export function resolveLookupConfig(options: LookupConfigLoadOptions = {}): ResolvedLookupConfig {
	const cwd = options.cwd ?? process.cwd();
	const homeDir = options.homeDir ?? homedir();
	const env = options.env ?? process.env;

	const warnings: string[] = [];
	const warn = (message: string) => {
		warnings.push(message);
		(options.warn ?? console.warn)(message);
	};

	let threshold = DEFAULT_SIMILARITY_THRESHOLD;
	let source: ThresholdSource = "default";
	let configPath: string | undefined;

	for (const candidatePath of getConfigCandidates(cwd, homeDir, options.explicitConfigPath)) {
		const parsed = parseConfigFile(candidatePath, warn);
		if (!parsed) {
			continue;
		}
		if (parsed.threshold !== undefined) {
			threshold = parsed.threshold;
			source = "config";
		}
		configPath = candidatePath;
	}

	const envThreshold = readEnvThreshold(env, warn);
	if (envThreshold !== undefined) {
		threshold = envThreshold;
		source = "env";
	}

	return {
		threshold,
		sources: { threshold: source },
		configPath,
		warnings,
	};
}

function getConfigCandidates(cwd: string, homeDir: string, explicitConfigPath?: string): string[] {
	const candidates: string[] = [];
	for (const baseDir of [join(homeDir, CONFIG_DIRNAME), join(cwd, CONFIG_DIRNAME)]) {
		// First existing file per directory wins.
		const found = CONFIG_FILENAMES.map((filename) => join(baseDir, filename)).find((path) => existsSync(path));
		if (found) {
			candidates.push(found);
		}
	}

	if (explicitConfigPath) {
		const explicitPath = isAbsolute(explicitConfigPath) ? explicitConfigPath : resolve(cwd, explicitConfigPath);
		if (existsSync(explicitPath)) {
			candidates.push(explicitPath);
		}
	}

	return dedupe(candidates);
}

function parseConfigFile(filePath: string, warn: (message: string) => void): LookupConfigFile | undefined {
	let parsed: unknown;
	try {
		const content = readFileSync(filePath, "utf-8");
		parsed = filePath.endsWith(".json") ? JSON.parse(content) : parseYaml(content);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		warn(`Failed to parse lookup config ${filePath}: ${message}`);
		return undefined;
	}

	if (!Value.Check(LookupConfigFileSchema, parsed)) {
		const firstError = Value.Errors(LookupConfigFileSchema, parsed).First();
		const detail = firstError ? `${firstError.path || "/"} ${firstError.message}` : "invalid shape";
		warn(`Ignoring invalid lookup config ${filePath}: ${detail}`);
		return undefined;
	}
	return parsed;
}

function readEnvThreshold(env: NodeJS.ProcessEnv, warn: (message: string) => void): number | undefined {
	const raw = env[THRESHOLD_ENV_KEY]?.trim();
	if (!raw) {
		return undefined;
	}

	const value = Number(raw);
	if (!Number.isFinite(value) || value < 0 || value > 1) {
		warn(`Ignoring ${THRESHOLD_ENV_KEY}=${raw}: expected a number between 0 and 1`);
		return undefined;
	}
	return value;
}

function dedupe(values: string[]): string[] {
	return [...new Set(values)];
}
