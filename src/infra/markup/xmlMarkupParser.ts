import { XMLParser, XMLValidator } from "fast-xml-parser";
import { err, ok, type Result } from "neverthrow";
import type { ParseError } from "../../core/entities/appError";
import type { MarkupElement } from "../../core/entities/markup";
import type { MarkupParserPort } from "../../core/ports/outboundPorts";

/**
 * Reference-form markup is produced on windows-1252 systems regardless of what the prolog declares.
 */
export const FILING_MARKUP_ENCODING = "windows-1252";

const TEXT_KEY = "#text";
const ATTRIBUTES_KEY = ":@";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asNodeList = (value: unknown): unknown[] =>
  Array.isArray(value) ? value : [];

const collectText = (nodes: unknown[]): string =>
  nodes
    .map((node) =>
      isRecord(node) && TEXT_KEY in node ? String(node[TEXT_KEY]) : "",
    )
    .join("");

const toElements = (nodes: unknown[]): MarkupElement[] => {
  const elements: MarkupElement[] = [];

  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }

    for (const [name, value] of Object.entries(node)) {
      if (name === TEXT_KEY || name === ATTRIBUTES_KEY) {
        continue;
      }

      const children = asNodeList(value);
      elements.push({
        name,
        text: collectText(children),
        children: toElements(children),
      });
    }
  }

  return elements;
};

/**
 * Decodes filing markup with the legacy codepage and turns it into an element tree.
 */
export class XmlMarkupParser implements MarkupParserPort {
  private readonly decoder = new TextDecoder(FILING_MARKUP_ENCODING);
  private readonly parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    trimValues: true,
  });

  parse(bytes: Uint8Array): Result<MarkupElement, ParseError> {
    const text = this.decoder.decode(bytes);

    const validation = XMLValidator.validate(text);
    if (validation !== true) {
      return err({
        kind: "parse",
        message: `Malformed markup: ${validation.err.msg}`,
        line: validation.err.line,
        column: validation.err.col,
      });
    }

    let parsed: unknown;
    try {
      parsed = this.parser.parse(text);
    } catch (error) {
      return err({
        kind: "parse",
        message: error instanceof Error ? error.message : "Markup parser failed.",
        cause: error,
      });
    }

    const [root] = toElements(asNodeList(parsed));
    if (!root) {
      return err({ kind: "parse", message: "Markup has no root element." });
    }

    return ok(root);
  }
}
