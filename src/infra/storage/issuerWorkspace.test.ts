import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LocalIssuerWorkspace } from "./issuerWorkspace";

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("LocalIssuerWorkspace", () => {
  let root: string;
  let workspace: LocalIssuerWorkspace;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "issuer-workspace-"));
    workspace = new LocalIssuerWorkspace(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes files into the zero-padded issuer directory", async () => {
    const result = await workspace.writeFile(14206, "nested/014206FRE31-12-2024v6.xml", bytes("<Root/>"));

    const expected = path.join(root, "014206_files", "014206FRE31-12-2024v6.xml");
    expect(result._unsafeUnwrap()).toBe(expected);
    expect(await readFile(expected, "utf8")).toBe("<Root/>");
  });

  it("stores an attachment once and leaves the existing file alone", async () => {
    const first = await workspace.saveAttachment(7, "esg_information_abc.pdf", bytes("first"));
    const second = await workspace.saveAttachment(7, "esg_information_abc.pdf", bytes("second"));

    const expected = path.join(root, "000007_files", "attachments", "esg_information_abc.pdf");
    expect(first._unsafeUnwrap()).toEqual({ storagePath: expected, created: true });
    expect(second._unsafeUnwrap()).toEqual({ storagePath: expected, created: false });
    expect(await readFile(expected, "utf8")).toBe("first");
  });

  it("reads back written files and reports missing ones as storage errors", async () => {
    const written = (await workspace.writeFile(1, "a.zip", bytes("zip")))._unsafeUnwrap();

    expect(new TextDecoder().decode((await workspace.readFile(written))._unsafeUnwrap())).toBe("zip");
    expect((await workspace.readFile(path.join(root, "nope.xml")))._unsafeUnwrapErr().kind).toBe(
      "storage",
    );
  });
});
