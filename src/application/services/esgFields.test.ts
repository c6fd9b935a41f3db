import { describe, expect, it } from "vitest";
import type { MarkupElement } from "../../core/entities/markup";
import { extractQuantitativeData, markupTags } from "./esgFields";
import { NumericFieldReader } from "./markupQuery";

const el = (name: string, content: string | MarkupElement[] = ""): MarkupElement =>
  typeof content === "string"
    ? { name, text: content, children: [] }
    : { name, text: "", children: content };

const boardEthnicity = (body: string, white: string): MarkupElement =>
  el(markupTags.boardEthnicity, [
    el("OrgaoAdministracao", body),
    el("Branco", white),
    el("Pardo", "1"),
    el("PrefereNaoResponder", "0"),
  ]);

const boardGender = (body: string, female: string): MarkupElement =>
  el(markupTags.boardGender, [
    el("OrgaoAdministracao", body),
    el("Masculino", "5"),
    el("Feminino", female),
  ]);

describe("extractQuantitativeData", () => {
  it("merges board ethnicity and gender by body name", () => {
    const root = el("Formulario", [
      el("Orgaos", [
        boardEthnicity("Conselho de Administração", "6"),
        boardEthnicity("Diretoria", "3"),
        boardGender("Diretoria", "2"),
        boardGender("Conselho Fiscal", "1"),
      ]),
    ]);
    const reader = new NumericFieldReader();

    const data = extractQuantitativeData(root, reader);

    expect(data.governanceBodies.map((body) => body.body)).toEqual([
      "Conselho de Administração",
      "Diretoria",
      "Conselho Fiscal",
    ]);
    expect(data.governanceBodies[0]?.gender).toBeUndefined();
    expect(data.governanceBodies[1]?.ethnicity?.white).toBe(3);
    expect(data.governanceBodies[1]?.ethnicity?.brown).toBe(1);
    expect(data.governanceBodies[1]?.gender).toEqual({
      male: 5,
      female: 2,
      nonBinary: 0,
      other: 0,
      undisclosed: 0,
    });
    expect(data.governanceBodies[2]?.ethnicity).toBeUndefined();
    expect(reader.warnings).toEqual([]);
  });

  it("lets a later entry for the same body overwrite the earlier breakdown", () => {
    const root = el("Formulario", [
      boardEthnicity("Diretoria", "3"),
      boardEthnicity("Diretoria", "8"),
    ]);

    const data = extractQuantitativeData(root, new NumericFieldReader());

    expect(data.governanceBodies).toHaveLength(1);
    expect(data.governanceBodies[0]?.ethnicity?.white).toBe(8);
  });

  it("skips board entries without a body name", () => {
    const root = el("Formulario", [
      el(markupTags.boardGender, [el("OrgaoAdministracao", "  "), el("Feminino", "2")]),
      el(markupTags.boardGender, [el("Feminino", "2")]),
    ]);

    expect(extractQuantitativeData(root, new NumericFieldReader()).governanceBodies).toEqual([]);
  });

  it("reads the first workforce entry of each breakdown with workforce spellings", () => {
    const root = el("Formulario", [
      el(markupTags.workforceEthnicity, [el("Parda", "40"), el("PrefiroNaoResponder", "2")]),
      el(markupTags.workforceEthnicity, [el("Parda", "99")]),
      el(markupTags.workforceAge, [
        el("FaixaAbaixo30", "10"),
        el("FaixaDe30a50", "20"),
        el("FaixaAcima50", "5"),
      ]),
      el(markupTags.workforceRegion, [el("Sudeste", "70"), el("Exterior", "3")]),
    ]);

    const data = extractQuantitativeData(root, new NumericFieldReader());

    expect(data.workforce.ethnicity?.brown).toBe(40);
    expect(data.workforce.ethnicity?.undisclosed).toBe(2);
    expect(data.workforce.gender).toBeUndefined();
    expect(data.workforce.ageBracket).toEqual({ under30: 10, from30To50: 20, over50: 5 });
    expect(data.workforce.region).toEqual({
      north: 0,
      northeast: 0,
      centralWest: 0,
      southeast: 70,
      south: 0,
      abroad: 3,
    });
  });

  it("reads compensation as floats and omits it when absent", () => {
    const withCompensation = el("Formulario", [
      el(markupTags.compensation, [
        el("RemuneracaoMaior", "125000.50"),
        el("RemuneracaoMediana", "4200"),
        el("RazaoRemuneracoes", "29.76"),
      ]),
    ]);

    expect(extractQuantitativeData(withCompensation, new NumericFieldReader()).compensation).toEqual({
      highest: 125000.5,
      median: 4200,
      ratio: 29.76,
    });
    expect(
      extractQuantitativeData(el("Formulario"), new NumericFieldReader()),
    ).toEqual({ governanceBodies: [], workforce: {} });
  });

  it("defaults unreadable numbers to zero and records a warning", () => {
    const root = el("Formulario", [
      el(markupTags.workforceGender, [el("Masculino", "12a"), el("Feminino", "")]),
      el(markupTags.compensation, [el("RemuneracaoMaior", "n/d")]),
    ]);
    const reader = new NumericFieldReader();

    const data = extractQuantitativeData(root, reader);

    expect(data.workforce.gender?.male).toBe(0);
    expect(data.workforce.gender?.female).toBe(0);
    expect(data.compensation?.highest).toBe(0);
    expect(reader.warnings).toEqual([
      { field: "workforce.gender.male", rawValue: "12a" },
      { field: "compensation.highest", rawValue: "n/d" },
    ]);
  });
});
