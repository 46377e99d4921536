import { readFile, writeFile, mkdtemp, rm } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Executor } from "../execution/executor.js";
import type { MirrorSwitcher } from "../update/orchestrator.js";
import { findCurrentMirror, replaceMirror } from "./sources-list.js";
import { normalizeMirrorUrl } from "../mirrors/exclusions.js";
import { MirrorError, MirrorErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** deb822 files newer releases ship instead of a populated sources.list. */
const DEB822_CANDIDATES = ["/etc/apt/sources.list.d/ubuntu.sources", "/etc/apt/sources.list.d/debian.sources"];

/** Configured path, else the first deb822 file that exists, else /etc/apt/sources.list. */
export function resolveSourcesListPath(configured: string | null, exists: (path: string) => boolean = existsSync): string {
  if (configured) return configured;
  return DEB822_CANDIDATES.find(exists) ?? "/etc/apt/sources.list";
}

export interface SourcesFileOptions {
  readonly timeoutMs: number;
  /** Prefix privileged commands with `sudo -n`. */
  readonly sudo: boolean;
  /** When switching to this archive, security entries follow. */
  readonly archiveUrl?: string | null;
  readonly securityUrl?: string | null;
  readonly now?: () => Date;
}

/** The system's sources list: read directly, written through the executor with a backup. */
export class SourcesListFile implements MirrorSwitcher {
  constructor(
    readonly path: string,
    private readonly executor: Executor,
    private readonly options: SourcesFileOptions,
  ) {}

  async read(): Promise<string> {
    try {
      return await readFile(this.path, "utf-8");
    } catch (err) {
      throw new MirrorError(MirrorErrorCode.SOURCES_LIST_ERROR, `Cannot read ${this.path}: ${err instanceof Error ? err.message : String(err)}`, { path: this.path });
    }
  }

  async currentMirror(): Promise<string> {
    return findCurrentMirror(await this.read());
  }

  /** Back up the current file to `<path>.backup.<epoch>` and install `content`. Returns the backup path. */
  async install(content: string): Promise<string> {
    const stamp = Math.floor((this.options.now?.() ?? new Date()).getTime() / 1000);
    const backupPath = `${this.path}.backup.${stamp}`;
    const dir = await mkdtemp(join(tmpdir(), "apt-mirror-"));
    const staged = join(dir, "sources");
    try {
      await writeFile(staged, content, "utf-8");
      await this.run(["cp", "-p", this.path, backupPath]);
      await this.run(["install", "-m", "0644", staged, this.path]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
    logger.info({ path: this.path, backupPath }, "Sources list installed");
    return backupPath;
  }

  async switchMirror(from: string, to: string): Promise<void> {
    const content = await this.read();
    const fromUrls = [from];
    const { archiveUrl, securityUrl } = this.options;
    if (archiveUrl && securityUrl && normalizeMirrorUrl(to) === normalizeMirrorUrl(archiveUrl)) fromUrls.push(securityUrl);
    const updated = replaceMirror(content, fromUrls, to);
    if (updated === content) {
      throw new MirrorError(MirrorErrorCode.SOURCES_LIST_ERROR, `No entries for ${from} in ${this.path}`, { path: this.path, from, to });
    }
    await this.install(updated);
  }

  private async run(argv: string[]): Promise<void> {
    const full = this.options.sudo ? ["sudo", "-n", ...argv] : argv;
    const r = await this.executor.execute({ argv: full }, this.options.timeoutMs);
    if (r.exitCode !== 0) {
      throw new MirrorError(MirrorErrorCode.SOURCES_LIST_ERROR, `'${full.join(" ")}' failed: ${r.stderr.trim()}`, { exitCode: r.exitCode });
    }
  }
}
