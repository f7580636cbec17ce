import { readFile, readdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import type { ToolManifest } from "@lantern/schemas";
import { validateToolManifestData, isToolManifest, errorMessage } from "@lantern/schemas";

export const DEFAULT_TOOLS_DIR = fileURLToPath(new URL("../../../tools", import.meta.url));

export interface ToolSummary {
  name: string;
  version: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export class ToolRegistry {
  private tools = new Map<string, ToolManifest>();

  register(manifest: ToolManifest): void {
    const validation = validateToolManifestData(manifest);
    if (!validation.valid) {
      throw new Error(`Invalid tool manifest "${manifest.name}": ${validation.errors.join(", ")}`);
    }
    this.tools.set(manifest.name, manifest);
  }

  async loadFromFile(filePath: string): Promise<ToolManifest> {
    if (!existsSync(filePath)) throw new Error(`Tool manifest not found: ${filePath}`);
    const content = await readFile(filePath, "utf-8");
    const data: unknown = yaml.load(content);
    if (!isToolManifest(data)) {
      throw new Error(`Invalid tool manifest at "${filePath}": ${validateToolManifestData(data).errors.join(", ")}`);
    }
    this.tools.set(data.name, data);
    return data;
  }

  async loadFromDirectory(dirPath: string = DEFAULT_TOOLS_DIR): Promise<ToolManifest[]> {
    if (!existsSync(dirPath)) return [];
    const entries = await readdir(dirPath, { withFileTypes: true });
    const loaded: ToolManifest[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const manifestPath = join(dirPath, entry.name, "tool.yaml");
      if (!existsSync(manifestPath)) continue;
      try {
        loaded.push(await this.loadFromFile(manifestPath));
      } catch (err) {
        console.error(`[tools] Failed to load tool "${entry.name}": ${errorMessage(err)}`);
      }
    }
    return loaded;
  }

  get(name: string): ToolManifest | undefined { return this.tools.get(name); }

  require(name: string): ToolManifest {
    const tool = this.tools.get(name);
    if (!tool) throw new Error(`Tool not found: "${name}"`);
    return tool;
  }

  list(): ToolManifest[] {
    return [...this.tools.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  summaries(): ToolSummary[] {
    return this.list().map((t) => ({
      name: t.name,
      version: t.version,
      description: t.description,
      input_schema: t.input_schema,
    }));
  }
}
