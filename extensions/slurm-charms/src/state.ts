import fs from "node:fs/promises";
import path from "node:path";
import type { Static, TObject } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export function statePath(stateDir: string, name: string): string {
  return path.join(stateDir, `${name}.json`);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Durable per-unit state: one JSON document per charm, loaded once at
 * startup and saved after every handler that mutates it.
 */
export class StateStore<S extends TObject> {
  private readonly file: string;
  private readonly schema: S;

  constructor(params: { stateDir: string; name: string; schema: S }) {
    this.file = statePath(params.stateDir, params.name);
    this.schema = params.schema;
  }

  get path(): string {
    return this.file;
  }

  defaults(): Static<S> {
    return Value.Create(this.schema);
  }

  async load(): Promise<Static<S>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return this.defaults();
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    const value: unknown = Value.Default(this.schema, parsed);
    if (!Value.Check(this.schema, value)) {
      const first = Value.Errors(this.schema, value).First();
      throw new Error(
        `State file ${this.file} is invalid${first ? ` at ${first.path || "/"}: ${first.message}` : ""}`,
      );
    }
    return value;
  }

  async save(state: Static<S>): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    await fs.writeFile(this.file, `${JSON.stringify(state, null, 2)}\n`, "utf8");
  }
}
