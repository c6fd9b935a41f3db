export type Issuer = {
  issuerCode: number;
  taxId: string;
  name: string;
  sector: string;
  registrationStatus: string;
  active: boolean;
  firstSeenAt: Date;
  updatedAt: Date;
};

/**
 * One row of the regulator's bulk filing dataset after validation.
 */
export type BulkFilingRow = {
  taxId: string;
  issuerCode: number;
  issuerName: string;
  sector: string;
  registrationStatus: string;
  referenceDate: Date;
  receivedAt: Date;
  version: number;
  sourceId: string;
  category: string;
  url: string;
};
