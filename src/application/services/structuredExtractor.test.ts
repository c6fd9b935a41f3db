import { err, ok } from "neverthrow";
import pino from "pino";
import { describe, expect, it } from "vitest";
import type { IssuerWorkspacePort } from "../../core/ports/outboundPorts";
import { XmlMarkupParser } from "../../infra/markup/xmlMarkupParser";
import { markupTags } from "./esgFields";
import { decodeBase64Payload, StructuredExtractor } from "./structuredExtractor";

const logger = pino({ level: "silent" });
const clock = { now: () => new Date("2026-03-01T12:00:00.000Z") };

// base64("hello") and its md5
const helloBase64 = "aGVsbG8=";
const helloMd5 = "5d41402abc4b2a76b9719d911017c592";

const createWorkspace = (options: { failWrites?: boolean } = {}) => {
  const files = new Map<string, Uint8Array>();
  const workspace: IssuerWorkspacePort = {
    writeFile: async (issuerCode, name, bytes) => {
      const path = `/ws/${issuerCode}/${name}`;
      files.set(path, bytes);
      return ok(path);
    },
    saveAttachment: async (issuerCode, filename, bytes) => {
      if (options.failWrites) {
        return err({ kind: "storage", message: "disk full" });
      }
      const storagePath = `/ws/${issuerCode}/attachments/${filename}`;
      const created = !files.has(storagePath);
      files.set(storagePath, bytes);
      return ok({ storagePath, created });
    },
    readFile: async (path) => {
      const bytes = files.get(path);
      return bytes ? ok(bytes) : err({ kind: "storage", message: `missing ${path}` });
    },
  };
  return { files, workspace };
};

const markup = `<?xml version="1.0" encoding="windows-1252"?>
<XmlFormularioReferencia>
  <Secao>
    <InfoASG><ImagemObjetoArquivoPdf>${helloBase64}</ImagemObjetoArquivoPdf></InfoASG>
  </Secao>
  <DescricaoRH><ImagemObjetoArquivoPdf>@@not-base64@@</ImagemObjetoArquivoPdf></DescricaoRH>
  <PlanoNegocios><ImagemObjetoArquivoPdf></ImagemObjetoArquivoPdf></PlanoNegocios>
  <${markupTags.workforceGender}>
    <Masculino>30</Masculino>
    <Feminino>x</Feminino>
  </${markupTags.workforceGender}>
</XmlFormularioReferencia>`;

describe("StructuredExtractor", () => {
  it("stores valid attachments by content hash and extracts fields", async () => {
    const { files, workspace } = createWorkspace();
    files.set("/ws/14206/form.xml", new TextEncoder().encode(markup));
    const extractor = new StructuredExtractor(workspace, new XmlMarkupParser(), clock, logger);

    const result = await extractor.extract(14206, "/ws/14206/form.xml");

    expect(result.isOk()).toBe(true);
    const extraction = result._unsafeUnwrap();
    expect(extraction.extractedAt).toBe("2026-03-01T12:00:00.000Z");
    expect(extraction.attachments).toEqual({
      esg_information: {
        filename: `esg_information_${helloMd5}.pdf`,
        contentHash: helloMd5,
        storagePath: `/ws/14206/attachments/esg_information_${helloMd5}.pdf`,
      },
    });
    expect(
      new TextDecoder().decode(files.get(`/ws/14206/attachments/esg_information_${helloMd5}.pdf`)),
    ).toBe("hello");
    expect(extraction.quantitative.workforce.gender?.male).toBe(30);
    expect(extraction.warnings).toEqual([{ field: "workforce.gender.female", rawValue: "x" }]);
  });

  it("gives identical payloads the same hash and stores nothing new on re-extraction", async () => {
    const { files, workspace } = createWorkspace();
    files.set(
      "/ws/5/form.xml",
      new TextEncoder().encode(
        `<Root><InfoASG><ImagemObjetoArquivoPdf>${helloBase64}</ImagemObjetoArquivoPdf></InfoASG>` +
          `<DescricaoRH><ImagemObjetoArquivoPdf>${helloBase64}</ImagemObjetoArquivoPdf></DescricaoRH></Root>`,
      ),
    );
    const extractor = new StructuredExtractor(workspace, new XmlMarkupParser(), clock, logger);

    const first = (await extractor.extract(5, "/ws/5/form.xml"))._unsafeUnwrap();
    const storedAfterFirst = [...files.keys()].sort();
    await extractor.extract(5, "/ws/5/form.xml");

    expect(first.attachments.esg_information?.contentHash).toBe(helloMd5);
    expect(first.attachments.human_resources?.contentHash).toBe(helloMd5);
    expect([...files.keys()].sort()).toEqual(storedAfterFirst);
    expect(storedAfterFirst).toEqual([
      "/ws/5/attachments/esg_information_5d41402abc4b2a76b9719d911017c592.pdf",
      "/ws/5/attachments/human_resources_5d41402abc4b2a76b9719d911017c592.pdf",
      "/ws/5/form.xml",
    ]);
  });

  it("skips attachments whose write fails without failing the extraction", async () => {
    const { files, workspace } = createWorkspace({ failWrites: true });
    files.set("/ws/1/form.xml", new TextEncoder().encode(markup));
    const extractor = new StructuredExtractor(workspace, new XmlMarkupParser(), clock, logger);

    const result = await extractor.extract(1, "/ws/1/form.xml");

    expect(result._unsafeUnwrap().attachments).toEqual({});
  });

  it("fails with a parse error on malformed markup", async () => {
    const { files, workspace } = createWorkspace();
    files.set("/ws/1/form.xml", new TextEncoder().encode("<Root><Open></Root>"));
    const extractor = new StructuredExtractor(workspace, new XmlMarkupParser(), clock, logger);

    const result = await extractor.extract(1, "/ws/1/form.xml");

    expect(result._unsafeUnwrapErr().kind).toBe("parse");
  });

  it("fails with a storage error when the markup cannot be read", async () => {
    const { workspace } = createWorkspace();
    const extractor = new StructuredExtractor(workspace, new XmlMarkupParser(), clock, logger);

    const result = await extractor.extract(1, "/ws/1/missing.xml");

    expect(result._unsafeUnwrapErr().kind).toBe("storage");
  });
});

describe("decodeBase64Payload", () => {
  it("accepts wrapped base64 and rejects malformed text", () => {
    expect(decodeBase64Payload("aGVs\nbG8=")).toEqual(new TextEncoder().encode("hello"));
    expect(decodeBase64Payload("aGVsbG8")).toBeNull();
    expect(decodeBase64Payload("@@@@")).toBeNull();
    expect(decodeBase64Payload("   ")).toBeNull();
  });
});
