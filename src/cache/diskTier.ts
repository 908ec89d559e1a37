import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../core/errors";
import { Logger } from "../observability";

export function cacheKey(url: string): string {
  return crypto.createHash("sha256").update(url).digest("hex");
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** One file per URL under `directory`, named by the SHA-256 of the URL. */
export class DiskTier {
  constructor(
    private readonly directory: string,
    private readonly logger: Logger,
  ) {}

  pathFor(url: string): string {
    return path.resolve(this.directory, cacheKey(url));
  }

  /** Empty or unreadable files are removed and reported as a miss. */
  async read(url: string): Promise<Buffer | undefined> {
    const filePath = this.pathFor(url);
    let data: Buffer;
    try {
      data = await fs.promises.readFile(filePath);
    } catch (error) {
      if (!isMissing(error)) {
        this.logger.debug("cache_disk_unreadable", { url, error: errorMessage(error) });
        await this.discard(url);
      }
      return undefined;
    }

    if (data.length === 0) {
      this.logger.debug("cache_disk_empty", { url });
      await this.discard(url);
      return undefined;
    }
    return data;
  }

  async write(url: string, data: Buffer): Promise<void> {
    const filePath = this.pathFor(url);
    const tempPath = `${filePath}.part`;
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(tempPath, data);
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      this.logger.warn("cache_disk_write_failed", { url, error: errorMessage(error) });
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug("cache_disk_cleanup_failed", { url, error: errorMessage(cleanupError) });
      });
    }
  }

  async remove(url: string): Promise<void> {
    await fs.promises.rm(this.pathFor(url), { force: true, recursive: true });
  }

  private async discard(url: string): Promise<void> {
    try {
      await this.remove(url);
    } catch (error) {
      this.logger.warn("cache_disk_discard_failed", { url, error: errorMessage(error) });
    }
  }
}
