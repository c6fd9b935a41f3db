import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { err, ok, type Result } from "neverthrow";
import type { StorageError } from "../../core/entities/appError";
import type {
  IssuerWorkspacePort,
  SavedAttachment,
} from "../../core/ports/outboundPorts";

export const ATTACHMENTS_DIR = "attachments";

export const issuerDirectoryName = (issuerCode: number): string =>
  `${String(issuerCode).padStart(6, "0")}_files`;

const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && "code" in error && error.code === code;

const storageError = (message: string, cause: unknown): StorageError => ({
  kind: "storage",
  message: `${message}: ${cause instanceof Error ? cause.message : String(cause)}`,
  cause,
});

/**
 * Filesystem workspace rooted at the data directory, one `{code}_files` folder per issuer.
 */
export class LocalIssuerWorkspace implements IssuerWorkspacePort {
  constructor(private readonly rootDir: string) {}

  issuerDir(issuerCode: number): string {
    return path.join(this.rootDir, issuerDirectoryName(issuerCode));
  }

  async writeFile(
    issuerCode: number,
    name: string,
    bytes: Uint8Array,
  ): Promise<Result<string, StorageError>> {
    const directory = this.issuerDir(issuerCode);
    const target = path.join(directory, path.basename(name));

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(target, bytes);
      return ok(target);
    } catch (error) {
      return err(storageError(`Could not write ${target}`, error));
    }
  }

  /**
   * Names are content-addressed, so an existing file is already the right one and stays untouched.
   */
  async saveAttachment(
    issuerCode: number,
    filename: string,
    bytes: Uint8Array,
  ): Promise<Result<SavedAttachment, StorageError>> {
    const directory = path.join(this.issuerDir(issuerCode), ATTACHMENTS_DIR);
    const storagePath = path.join(directory, path.basename(filename));

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(storagePath, bytes, { flag: "wx" });
      return ok({ storagePath, created: true });
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) {
        return ok({ storagePath, created: false });
      }
      return err(storageError(`Could not store ${storagePath}`, error));
    }
  }

  async readFile(filePath: string): Promise<Result<Uint8Array, StorageError>> {
    try {
      return ok(new Uint8Array(await readFile(filePath)));
    } catch (error) {
      return err(storageError(`Could not read ${filePath}`, error));
    }
  }
}
