import { describe, expect, it } from "vitest";
import { DOCX_TYPE, fixtureBytes } from "@/test/fixtures";
import { ExtractionError, UnsupportedFormatError } from "@/utils/errors";
import { extractText } from "@/utils/extractText.server";

describe("extractText", () => {
  it("reads every page of a PDF, one line per baseline", async () => {
    const text = await extractText("resume.pdf", fixtureBytes("resume.pdf"));

    expect(text).toBe(
      [
        "Jane Doe - Backend Engineer",
        "5 years of experience with Python and SQL",
        "Education: BSc Computer Science, 2016",
      ].join("\n")
    );
  });

  it("reads a PDF whose bytes sit at an offset inside a larger Buffer", async () => {
    // small Buffer copies come out of a shared pool at a nonzero byteOffset
    const bytes = fixtureBytes("short.pdf");
    const backing = Buffer.alloc(bytes.length + 16);
    backing.set(bytes, 16);
    const view = backing.subarray(16);
    expect(view.byteOffset).toBe(16);

    await expect(extractText("short.pdf", view)).resolves.toBe("Short resume text only 30 char");
  });

  it("joins DOCX paragraphs with a single newline", async () => {
    const text = await extractText("resume.docx", fixtureBytes("resume.docx"));

    expect(text).toBe(
      [
        "Jane Doe",
        "Backend Engineer",
        "5 years of experience with Python and SQL",
        "Built REST APIs & data pipelines for <internal> analytics.",
      ].join("\n")
    );
  });

  it("matches the extension case-insensitively", async () => {
    const text = await extractText("CV.DOCX", fixtureBytes("resume.docx"));
    expect(text.startsWith("Jane Doe\n")).toBe(true);
  });

  it("trims the short PDF to its visible text", async () => {
    const text = await extractText("short.pdf", fixtureBytes("short.pdf"));
    expect(text).toBe("Short resume text only 30 char");
    expect(text).toHaveLength(30);
  });

  it.each(["notes.txt", "resume.doc", "photo.png", "archive.tar.gz", "resume", ""])(
    "rejects %j as an unsupported format",
    async (name) => {
      const err = await extractText(name, new Uint8Array([1, 2, 3])).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(UnsupportedFormatError);
      if (!(err instanceof UnsupportedFormatError)) return;
      expect(err.status).toBe(400);
      expect(err.supported).toEqual(["pdf", "docx"]);
    }
  );

  it("names the extension in the unsupported-format message", async () => {
    await expect(extractText("notes.txt", new Uint8Array())).rejects.toThrow(
      "Unsupported file format: txt. Only PDF and DOCX are supported."
    );
  });

  it("wraps reader failures on corrupt PDF bytes", async () => {
    const bytes = new TextEncoder().encode("this is not a pdf at all");
    const err = await extractText("broken.pdf", bytes).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExtractionError);
    if (!(err instanceof ExtractionError)) return;
    expect(err.format).toBe("pdf");
    expect(err.status).toBe(400);
    expect(err.message.startsWith("Error extracting PDF: ")).toBe(true);
  });

  it("wraps reader failures on corrupt DOCX bytes", async () => {
    const bytes = new TextEncoder().encode(`not a zip, despite ${DOCX_TYPE}`);
    const err = await extractText("broken.docx", bytes).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExtractionError);
    if (!(err instanceof ExtractionError)) return;
    expect(err.format).toBe("docx");
    expect(err.message.startsWith("Error extracting DOCX: ")).toBe(true);
  });
});
