import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";

export interface ServerConfig {
  port: number;
}

export interface StorageConfig {
  save_path: string;
  file_limit: number;
  single_file_size_limit: number;
}

export interface AssetsConfig {
  static_root: string;
  vendor_root: string;
}

export interface Config {
  server: ServerConfig;
  storage: StorageConfig;
  assets: AssetsConfig;
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

// Non-negative integers only; anything else defers to the next source.
function parseCount(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function parseText(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  return undefined;
}

function readYaml(candidates: string[]): RawSection {
  for (const p of candidates) {
    const file = path.resolve(p);
    if (fs.existsSync(file)) {
      const parsed: unknown = yaml.load(fs.readFileSync(file, "utf-8"));
      return isRecord(parsed) ? parsed : {};
    }
  }
  return {};
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  candidates: string[] = ["app.yaml"],
): Config {
  const raw = readYaml(candidates);

  const server = section(raw, "server");
  const storage = section(raw, "storage");
  const assets = section(raw, "assets");

  return {
    server: {
      port: parseCount(env.PORT) ?? parseCount(server.port) ?? 8080,
    },
    storage: {
      save_path: parseText(env.SAVE_PATH) ?? parseText(storage.save_path) ?? "_tmp",
      file_limit: parseCount(env.FILE_LIMIT) ?? parseCount(storage.file_limit) ?? 100000,
      single_file_size_limit:
        parseCount(env.SINGLE_FILE_SIZE_LIMIT) ??
        parseCount(storage.single_file_size_limit) ??
        10240,
    },
    assets: {
      static_root: parseText(env.STATIC_ROOT) ?? parseText(assets.static_root) ?? "public",
      vendor_root: parseText(env.VENDOR_ROOT) ?? parseText(assets.vendor_root) ?? "node_modules",
    },
  };
}
