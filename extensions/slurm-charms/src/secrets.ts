import { generateKeyPairSync, randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import { ioError, writeOwnedFile } from "./files.js";
import type { CommandRunner } from "./types.js";

export type KeyEncoding = "base64" | "utf8";

export type KeyManagerParams = {
  runner: CommandRunner;
  path: string;
  owner: string;
  mode?: number;
  encoding: KeyEncoding;
  create: () => Buffer;
};

/**
 * A secret on disk exchanged as a string: the munge key travels base64
 * encoded, the JWT signing key as its PEM text.
 */
export class KeyManager {
  readonly path: string;
  private readonly runner: CommandRunner;
  private readonly owner: string;
  private readonly mode: number;
  private readonly encoding: KeyEncoding;
  private readonly create: () => Buffer;

  constructor(params: KeyManagerParams) {
    this.runner = params.runner;
    this.path = params.path;
    this.owner = params.owner;
    this.mode = params.mode ?? 0o600;
    this.encoding = params.encoding;
    this.create = params.create;
  }

  async generate(): Promise<string> {
    const key = this.create();
    await this.write(key);
    return key.toString(this.encoding);
  }

  async get(): Promise<string> {
    try {
      return (await fs.readFile(this.path)).toString(this.encoding);
    } catch (error) {
      throw ioError("read key", this.path, error);
    }
  }

  async set(value: string): Promise<void> {
    await this.write(Buffer.from(value, this.encoding));
  }

  private async write(key: Buffer): Promise<void> {
    await writeOwnedFile({
      runner: this.runner,
      file: this.path,
      content: key,
      mode: this.mode,
      owner: this.owner,
    });
  }
}

export function mungeKeyManager(params: { runner: CommandRunner; path: string }): KeyManager {
  return new KeyManager({
    ...params,
    owner: "munge:munge",
    encoding: "base64",
    create: () => randomBytes(1024),
  });
}

export function jwtKeyManager(params: { runner: CommandRunner; path: string }): KeyManager {
  return new KeyManager({
    ...params,
    owner: "slurm:slurm",
    encoding: "utf8",
    create: () => {
      const { privateKey } = generateKeyPairSync("rsa", {
        modulusLength: 2048,
        publicKeyEncoding: { type: "spki", format: "pem" },
        privateKeyEncoding: { type: "pkcs1", format: "pem" },
      });
      return Buffer.from(privateKey, "utf8");
    },
  });
}
