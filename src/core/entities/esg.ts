import type { FieldExtractionWarning } from "./appError";

export const attachmentSectionIds = [
  "esg_information",
  "integrity_program",
  "risk_management",
  "internal_controls",
  "human_resources",
  "risk_factors",
  "main_risk_factors",
  "issuer_history",
  "controlled_activities",
  "operating_segments",
  "production_and_markets",
  "government_regulation",
  "mixed_capital_company",
  "business_changes",
  "business_plan",
  "governance_bodies",
  "board_of_directors",
  "compensation_policy",
  "employee_compensation",
] as const;

export type AttachmentSectionId = (typeof attachmentSectionIds)[number];

export type AttachmentDescriptor = {
  filename: string;
  contentHash: string;
  storagePath: string;
};

export type EthnicityBreakdown = {
  asian: number;
  white: number;
  black: number;
  brown: number;
  indigenous: number;
  other: number;
  undisclosed: number;
};

export type GenderBreakdown = {
  male: number;
  female: number;
  nonBinary: number;
  other: number;
  undisclosed: number;
};

export type AgeBracketBreakdown = {
  under30: number;
  from30To50: number;
  over50: number;
};

export type RegionBreakdown = {
  north: number;
  northeast: number;
  centralWest: number;
  southeast: number;
  south: number;
  abroad: number;
};

export type GoverningBodyDiversity = {
  body: string;
  ethnicity?: EthnicityBreakdown;
  gender?: GenderBreakdown;
};

export type WorkforceDemographics = {
  ethnicity?: EthnicityBreakdown;
  gender?: GenderBreakdown;
  ageBracket?: AgeBracketBreakdown;
  region?: RegionBreakdown;
};

export type CompensationStatistics = {
  highest: number;
  median: number;
  ratio: number;
};

export type QuantitativeEsgData = {
  governanceBodies: GoverningBodyDiversity[];
  workforce: WorkforceDemographics;
  compensation?: CompensationStatistics;
};

export type ExtractionResult = {
  extractedAt: string;
  attachments: Partial<Record<AttachmentSectionId, AttachmentDescriptor>>;
  quantitative: QuantitativeEsgData;
  warnings: FieldExtractionWarning[];
};
