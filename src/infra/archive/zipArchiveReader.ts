import { readFile } from "node:fs/promises";
import JSZip from "jszip";
import { err, ok, type Result } from "neverthrow";
import type { PipelineStageError } from "../../core/entities/appError";
import type {
  ArchiveHandle,
  ArchiveReaderPort,
} from "../../core/ports/outboundPorts";

/**
 * Opens an in-memory zip and lists its file members (directories excluded).
 */
export const openZip = async (bytes: Uint8Array): Promise<ArchiveHandle> => {
  const zip = await JSZip.loadAsync(bytes);
  const members = Object.values(zip.files)
    .filter((entry) => !entry.dir)
    .map((entry) => entry.name);

  return {
    members,
    read: async (member) => {
      const entry = zip.file(member);
      if (!entry) {
        throw new Error(`Archive has no member ${member}.`);
      }
      return entry.async("uint8array");
    },
  };
};

/**
 * Reads filing containers from disk with jszip.
 */
export class ZipArchiveReader implements ArchiveReaderPort {
  async open(
    containerPath: string,
  ): Promise<Result<ArchiveHandle, PipelineStageError>> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(containerPath);
    } catch (error) {
      return err({
        kind: "storage",
        message: `Could not read container ${containerPath}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      });
    }

    try {
      return ok(await openZip(bytes));
    } catch (error) {
      return err({
        kind: "parse",
        message: `Container ${containerPath} is not a readable zip archive.`,
        cause: error,
      });
    }
  }
}
