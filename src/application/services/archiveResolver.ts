import path from "node:path";
import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import type { PipelineStageError } from "../../core/entities/appError";
import type { FilingRecord } from "../../core/entities/filing";
import type {
  ArchiveReaderPort,
  IssuerWorkspacePort,
} from "../../core/ports/outboundPorts";

const EXCLUDED_MEMBER_MARKER = "FormularioCadastral";

const pad = (value: number, width: number): string =>
  String(value).padStart(width, "0");

/**
 * Member name stem the regulator uses for a reference form, e.g. `014206FRE31-12-2024v6`.
 */
export const expectedMemberPattern = (
  issuerCode: number,
  referenceDate: Date,
  version: number,
): string => {
  const day = pad(referenceDate.getUTCDate(), 2);
  const month = pad(referenceDate.getUTCMonth() + 1, 2);
  const year = pad(referenceDate.getUTCFullYear(), 4);
  return `${pad(issuerCode, 6)}FRE${day}-${month}-${year}v${version}`;
};

export type ResolvableFiling = Pick<
  FilingRecord,
  "id" | "issuerCode" | "referenceDate" | "version"
>;

/**
 * Locates the reference-form markup inside a filing container and copies it into the issuer workspace.
 */
export class ArchiveResolver {
  constructor(
    private readonly archives: ArchiveReaderPort,
    private readonly workspace: IssuerWorkspacePort,
    private readonly logger: Logger,
  ) {}

  async resolve(
    filing: ResolvableFiling,
    containerPath: string,
  ): Promise<Result<string, PipelineStageError>> {
    const pattern = expectedMemberPattern(
      filing.issuerCode,
      filing.referenceDate,
      filing.version,
    );

    const archive = await this.archives.open(containerPath);
    if (archive.isErr()) {
      return err(archive.error);
    }

    const candidates = archive.value.members
      .filter(
        (member) =>
          member.toLowerCase().endsWith(".xml") &&
          member.includes(pattern) &&
          !member.includes(EXCLUDED_MEMBER_MARKER),
      )
      .sort();

    const [winner] = candidates;
    if (winner === undefined) {
      return err({
        kind: "resolution",
        message: `No markup member matching ${pattern} in ${path.basename(containerPath)}.`,
        expectedPattern: pattern,
      });
    }

    if (candidates.length > 1) {
      this.logger.warn(
        { recordId: filing.id, pattern, candidates, chosen: winner },
        "Several markup members match; using the lexically first",
      );
    }

    let bytes: Uint8Array;
    try {
      bytes = await archive.value.read(winner);
    } catch (error) {
      return err({
        kind: "parse",
        message: `Could not read ${winner}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      });
    }

    const written = await this.workspace.writeFile(
      filing.issuerCode,
      path.posix.basename(winner),
      bytes,
    );
    if (written.isErr()) {
      return err(written.error);
    }

    return ok(written.value);
  }
}
