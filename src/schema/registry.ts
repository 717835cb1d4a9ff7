import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck<T> = { ok: true; value: T } | { ok: false; errors: string };

/**
 * Schema registry: discovers every *.schema.json in a directory and checks
 * payloads against them by name.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "capacity.schema.json" → "capacity"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  /**
   * Validate `data` against a named schema. The caller names the type the
   * schema describes; on success the same value comes back narrowed to it.
   */
  async check<T>(name: string, data: unknown): Promise<SchemaCheck<T>> {
    const entry = this.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    if (!this.ajv) {
      this.ajv = await loadAjv();
    }

    const validate = this.ajv.compile<T>(entry.schema);
    if (validate(data)) return { ok: true, value: data };
    return { ok: false, errors: this.ajv.errorsText(validate.errors) };
  }
}

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  await registry.load();
  return registry;
}
