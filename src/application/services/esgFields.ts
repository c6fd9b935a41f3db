import type {
  AgeBracketBreakdown,
  CompensationStatistics,
  EthnicityBreakdown,
  GenderBreakdown,
  GoverningBodyDiversity,
  QuantitativeEsgData,
  RegionBreakdown,
  WorkforceDemographics,
} from "../../core/entities/esg";
import type { MarkupElement } from "../../core/entities/markup";
import {
  findChild,
  findDescendants,
  findFirstDescendant,
  type NumericFieldReader,
} from "./markupQuery";

const formPrefix = "XmlFormularioReferenciaDadosFREFormulario";

export const markupTags = {
  boardEthnicity: `${formPrefix}AssembleiaGeralEAdmDescricaoCaracteristicasOrgaosAdmECFCorRaca`,
  boardGender: `${formPrefix}AssembleiaGeralEAdmDescricaoCaracteristicasOrgaosAdmECFGenero`,
  bodyName: "OrgaoAdministracao",
  workforceEthnicity: `${formPrefix}RecursosHumanosDescricaoRHEmissorCorRaca`,
  workforceGender: `${formPrefix}RecursosHumanosDescricaoRHEmissorGenero`,
  workforceAge: `${formPrefix}RecursosHumanosDescricaoRHEmissorFaixaEtaria`,
  workforceRegion: `${formPrefix}RecursosHumanosDescricaoRHEmissorLocalizacaoGeografica`,
  compensation: "RemuneracaoEmpregadosEst",
} as const;

// Board and workforce sections spell the same categories differently.
type Spelling = { brown: string; undisclosed: string };
const boardSpelling: Spelling = { brown: "Pardo", undisclosed: "PrefereNaoResponder" };
const workforceSpelling: Spelling = { brown: "Parda", undisclosed: "PrefiroNaoResponder" };

const readEthnicity = (
  reader: NumericFieldReader,
  element: MarkupElement,
  field: string,
  spelling: Spelling,
): EthnicityBreakdown => ({
  asian: reader.readInt(element, "Amarelo", `${field}.asian`),
  white: reader.readInt(element, "Branco", `${field}.white`),
  black: reader.readInt(element, "Preto", `${field}.black`),
  brown: reader.readInt(element, spelling.brown, `${field}.brown`),
  indigenous: reader.readInt(element, "Indigena", `${field}.indigenous`),
  other: reader.readInt(element, "Outros", `${field}.other`),
  undisclosed: reader.readInt(element, spelling.undisclosed, `${field}.undisclosed`),
});

const readGender = (
  reader: NumericFieldReader,
  element: MarkupElement,
  field: string,
  spelling: Spelling,
): GenderBreakdown => ({
  male: reader.readInt(element, "Masculino", `${field}.male`),
  female: reader.readInt(element, "Feminino", `${field}.female`),
  nonBinary: reader.readInt(element, "NaoBinario", `${field}.nonBinary`),
  other: reader.readInt(element, "Outros", `${field}.other`),
  undisclosed: reader.readInt(element, spelling.undisclosed, `${field}.undisclosed`),
});

const readAgeBracket = (
  reader: NumericFieldReader,
  element: MarkupElement,
): AgeBracketBreakdown => ({
  under30: reader.readInt(element, "FaixaAbaixo30", "workforce.ageBracket.under30"),
  from30To50: reader.readInt(element, "FaixaDe30a50", "workforce.ageBracket.from30To50"),
  over50: reader.readInt(element, "FaixaAcima50", "workforce.ageBracket.over50"),
});

const readRegion = (
  reader: NumericFieldReader,
  element: MarkupElement,
): RegionBreakdown => ({
  north: reader.readInt(element, "Norte", "workforce.region.north"),
  northeast: reader.readInt(element, "Nordeste", "workforce.region.northeast"),
  centralWest: reader.readInt(element, "CentroOeste", "workforce.region.centralWest"),
  southeast: reader.readInt(element, "Sudeste", "workforce.region.southeast"),
  south: reader.readInt(element, "Sul", "workforce.region.south"),
  abroad: reader.readInt(element, "Exterior", "workforce.region.abroad"),
});

/**
 * Correlates the ethnicity and gender tables of the governing bodies by body name.
 * Bodies keep first-seen order; a later entry for the same body replaces that breakdown only.
 */
export const extractGovernanceBodies = (
  root: MarkupElement,
  reader: NumericFieldReader,
): GoverningBodyDiversity[] => {
  const bodies = new Map<string, GoverningBodyDiversity>();
  const entryFor = (body: string): GoverningBodyDiversity => {
    const existing = bodies.get(body);
    if (existing) {
      return existing;
    }
    const created: GoverningBodyDiversity = { body };
    bodies.set(body, created);
    return created;
  };
  const bodyNameOf = (element: MarkupElement): string | undefined => {
    const name = findChild(element, markupTags.bodyName)?.text.trim();
    return name ? name : undefined;
  };

  for (const element of findDescendants(root, markupTags.boardEthnicity)) {
    const body = bodyNameOf(element);
    if (body) {
      entryFor(body).ethnicity = readEthnicity(
        reader,
        element,
        `governanceBodies[${body}].ethnicity`,
        boardSpelling,
      );
    }
  }

  for (const element of findDescendants(root, markupTags.boardGender)) {
    const body = bodyNameOf(element);
    if (body) {
      entryFor(body).gender = readGender(
        reader,
        element,
        `governanceBodies[${body}].gender`,
        boardSpelling,
      );
    }
  }

  return Array.from(bodies.values());
};

export const extractWorkforce = (
  root: MarkupElement,
  reader: NumericFieldReader,
): WorkforceDemographics => {
  const workforce: WorkforceDemographics = {};

  const ethnicity = findFirstDescendant(root, markupTags.workforceEthnicity);
  if (ethnicity) {
    workforce.ethnicity = readEthnicity(reader, ethnicity, "workforce.ethnicity", workforceSpelling);
  }

  const gender = findFirstDescendant(root, markupTags.workforceGender);
  if (gender) {
    workforce.gender = readGender(reader, gender, "workforce.gender", workforceSpelling);
  }

  const age = findFirstDescendant(root, markupTags.workforceAge);
  if (age) {
    workforce.ageBracket = readAgeBracket(reader, age);
  }

  const region = findFirstDescendant(root, markupTags.workforceRegion);
  if (region) {
    workforce.region = readRegion(reader, region);
  }

  return workforce;
};

export const extractCompensation = (
  root: MarkupElement,
  reader: NumericFieldReader,
): CompensationStatistics | undefined => {
  const element = findFirstDescendant(root, markupTags.compensation);
  if (!element) {
    return undefined;
  }

  return {
    highest: reader.readFloat(element, "RemuneracaoMaior", "compensation.highest"),
    median: reader.readFloat(element, "RemuneracaoMediana", "compensation.median"),
    ratio: reader.readFloat(element, "RazaoRemuneracoes", "compensation.ratio"),
  };
};

/**
 * Field pass over a parsed reference form. Missing sections are left out rather than zero-filled.
 */
export const extractQuantitativeData = (
  root: MarkupElement,
  reader: NumericFieldReader,
): QuantitativeEsgData => {
  const governanceBodies = extractGovernanceBodies(root, reader);
  const workforce = extractWorkforce(root, reader);
  const compensation = extractCompensation(root, reader);

  return {
    governanceBodies,
    workforce,
    ...(compensation ? { compensation } : {}),
  };
};
