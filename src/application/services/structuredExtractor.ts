import { createHash } from "node:crypto";
import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import type { ParseError, StorageError } from "../../core/entities/appError";
import {
  attachmentSectionIds,
  type AttachmentDescriptor,
  type AttachmentSectionId,
  type ExtractionResult,
} from "../../core/entities/esg";
import type { MarkupElement } from "../../core/entities/markup";
import type {
  ClockPort,
  IssuerWorkspacePort,
  MarkupParserPort,
} from "../../core/ports/outboundPorts";
import { extractQuantitativeData } from "./esgFields";
import { findLeafText, NumericFieldReader } from "./markupQuery";

export const ATTACHMENT_LEAF = "ImagemObjetoArquivoPdf";

/**
 * Reference-form section element holding each catalogued PDF attachment.
 */
export const attachmentCatalog: Record<AttachmentSectionId, string> = {
  esg_information: "InfoASG",
  integrity_program: "ProgramaIntegridade",
  risk_management: "DescricaoGerenciamentoRiscos",
  internal_controls: "DescricaoControlesInternos",
  human_resources: "DescricaoRH",
  risk_factors: "DescricaoFatoresRisco",
  main_risk_factors: "Descricao5PrincipaisFatoresRisco",
  issuer_history: "HistoricoEmissor",
  controlled_activities: "AtividadesEmissorControladas",
  operating_segments: "InfoSegmentosOperacionais",
  production_and_markets: "ProducaoComercializacaoMercados",
  government_regulation: "EfeitosRegulacaoEstatal",
  mixed_capital_company: "InfoSociedadeEconomiaMista",
  business_changes: "AlteracoesNegocios",
  business_plan: "PlanoNegocios",
  governance_bodies: "CaracteristicasOrgaosAdmECF",
  board_of_directors: "InformacoesConselhoAdm",
  compensation_policy: "PoliticaPraticaRemuneracao",
  employee_compensation: "RemuneracaoEmpregados",
};

const base64Pattern = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Strict base64 decode; returns null for anything a lenient decoder would silently truncate.
 */
export const decodeBase64Payload = (text: string): Uint8Array | null => {
  const compact = text.replace(/\s+/g, "");
  if (compact.length === 0 || compact.length % 4 !== 0 || !base64Pattern.test(compact)) {
    return null;
  }

  const bytes = Buffer.from(compact, "base64");
  return bytes.length > 0 ? new Uint8Array(bytes) : null;
};

export const md5Hex = (bytes: Uint8Array): string =>
  createHash("md5").update(bytes).digest("hex");

/**
 * Turns one filing's reference-form markup into typed ESG fields plus content-addressed PDF attachments.
 */
export class StructuredExtractor {
  constructor(
    private readonly workspace: IssuerWorkspacePort,
    private readonly parser: MarkupParserPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  /**
   * Fails only when the markup cannot be read or parsed; attachment and field problems are absorbed.
   */
  async extract(
    issuerCode: number,
    markupPath: string,
  ): Promise<Result<ExtractionResult, ParseError | StorageError>> {
    const bytes = await this.workspace.readFile(markupPath);
    if (bytes.isErr()) {
      return err(bytes.error);
    }

    const parsed = this.parser.parse(bytes.value);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    const root = parsed.value;
    const attachments = await this.extractAttachments(issuerCode, root);
    const reader = new NumericFieldReader();
    const quantitative = extractQuantitativeData(root, reader);
    const warnings = reader.warnings;

    if (warnings.length > 0) {
      this.logger.warn(
        { issuerCode, markupPath, warnings },
        "Unreadable numeric fields defaulted to zero",
      );
    }

    return ok({
      extractedAt: this.clock.now().toISOString(),
      attachments,
      quantitative,
      warnings,
    });
  }

  private async extractAttachments(
    issuerCode: number,
    root: MarkupElement,
  ): Promise<ExtractionResult["attachments"]> {
    const attachments: ExtractionResult["attachments"] = {};

    for (const sectionId of attachmentSectionIds) {
      const text = findLeafText(root, attachmentCatalog[sectionId], ATTACHMENT_LEAF);
      if (text === undefined) {
        continue;
      }

      const payload = decodeBase64Payload(text);
      if (!payload) {
        this.logger.error(
          { issuerCode, section: sectionId },
          "Attachment payload is not valid base64; skipping section",
        );
        continue;
      }

      const contentHash = md5Hex(payload);
      const filename = `${sectionId}_${contentHash}.pdf`;
      const saved = await this.workspace.saveAttachment(issuerCode, filename, payload);
      if (saved.isErr()) {
        this.logger.error(
          { issuerCode, section: sectionId, error: saved.error },
          "Attachment could not be stored; skipping section",
        );
        continue;
      }

      const descriptor: AttachmentDescriptor = {
        filename,
        contentHash,
        storagePath: saved.value.storagePath,
      };
      attachments[sectionId] = descriptor;
    }

    return attachments;
  }
}
