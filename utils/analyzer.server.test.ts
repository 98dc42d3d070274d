import { describe, expect, it, vi } from "vitest";
import { fakeModel, sampleResult, testConfig } from "@/test/fixtures";
import {
  createResumeAnalyzer,
  MIN_TEXT_LENGTH,
  type AnalysisStage,
  type ResumeUpload,
} from "@/utils/analyzer.server";
import {
  AIInvocationError,
  ConfigurationError,
  InsufficientContentError,
  ResponseParseError,
  ValidationError,
} from "@/utils/errors";
import type { TextExtractor } from "@/utils/extractText.server";
import type { Logger } from "@/utils/logger";

const RESUME_TEXT = "Jane Doe\n5 years of experience with Python and SQL\nBuilt REST APIs.";
const JD = "Looking for a Python backend engineer with 3+ years experience";

function upload(name: string): ResumeUpload & { readonly reads: number } {
  let reads = 0;
  return {
    name,
    get reads() {
      return reads;
    },
    async arrayBuffer() {
      reads += 1;
      return new ArrayBuffer(8);
    },
  };
}

function fakeExtractor(text: string) {
  const extract = vi.fn<TextExtractor["extract"]>(async () => text);
  return { extractor: { extract }, extract };
}

function setup(opts: { reply?: string; text?: string; apiKey?: string | null } = {}) {
  const { model, prompts } = fakeModel(opts.reply ?? JSON.stringify(sampleResult));
  const { extractor, extract } = fakeExtractor(opts.text ?? RESUME_TEXT);
  const stages: AnalysisStage[] = [];
  const configured = opts.apiKey !== null;
  const analyzer = createResumeAnalyzer({
    config: testConfig({ geminiApiKey: configured ? opts.apiKey ?? "test-secret" : null }),
    model: configured ? model : null,
    extractor,
    onStage: (s) => stages.push(s),
  });
  return { analyzer, prompts, extract, stages };
}

describe("createResumeAnalyzer", () => {
  it("walks every stage and returns the validated result", async () => {
    const { analyzer, stages, prompts, extract } = setup();
    const file = upload("resume.pdf");

    const result = await analyzer.analyze({ file, jobDescription: JD });

    expect(result).toEqual(sampleResult);
    expect(stages).toEqual([
      "received",
      "validated",
      "text-extracted",
      "prompted",
      "ai-invoked",
      "parsed",
      "returned",
    ]);
    expect(extract).toHaveBeenCalledTimes(1);
    expect(extract.mock.calls[0][0]).toBe("resume.pdf");
    expect(prompts).toHaveLength(1);
    expect(prompts[0]).toContain(RESUME_TEXT);
    expect(prompts[0]).toContain(JD);
  });

  it("passes the job description through untrimmed", async () => {
    const { analyzer, prompts } = setup();
    const jd = `\n  ${JD}  \n`;

    await analyzer.analyze({ file: upload("cv.docx"), jobDescription: jd });

    expect(prompts[0]).toContain(`JOB DESCRIPTION:\n${jd}\n`);
  });

  it("fails on configuration before looking at the input", async () => {
    const { analyzer, stages, extract } = setup({ apiKey: null });
    const file = upload("resume.pdf");

    await expect(analyzer.analyze({ file, jobDescription: JD })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(() => analyzer.assertReady()).toThrow(
      "Gemini API key not configured. Please add GEMINI_API_KEY to .env file"
    );
    expect(file.reads).toBe(0);
    expect(extract).not.toHaveBeenCalled();
    expect(stages).toEqual(["received", "failed"]);
  });

  it("logs client errors as warnings tagged with their kind", async () => {
    const warn = vi.fn();
    const error = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error, child: () => logger };
    const analyzer = createResumeAnalyzer({
      config: testConfig(),
      model: fakeModel("{}").model,
      extractor: fakeExtractor(RESUME_TEXT).extractor,
      logger,
    });

    await analyzer.analyze({ file: null, jobDescription: JD }).catch(() => undefined);

    expect(warn).toHaveBeenCalledWith("[validation] Resume file is required");
    expect(error).not.toHaveBeenCalled();
  });

  it("logs server errors as errors tagged with their kind", async () => {
    const warn = vi.fn();
    const error = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error, child: () => logger };
    const analyzer = createResumeAnalyzer({ config: testConfig({ geminiApiKey: null }), model: null, logger });

    await analyzer.analyze({ file: null, jobDescription: JD }).catch(() => undefined);

    expect(error).toHaveBeenCalledWith(
      "[configuration] Gemini API key not configured. Please add GEMINI_API_KEY to .env file"
    );
    expect(warn).not.toHaveBeenCalled();
  });

  it("requires a file", async () => {
    const { analyzer } = setup();
    await expect(analyzer.analyze({ file: null, jobDescription: JD })).rejects.toThrow(
      "Resume file is required"
    );
  });

  it.each([null, "", "   \n\t"])(
    "rejects job description %j without reading the file",
    async (jobDescription) => {
      const { analyzer, extract } = setup();
      const file = upload("resume.pdf");

      const err = await analyzer.analyze({ file, jobDescription }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.message).toBe("Job description is required");
      expect(file.reads).toBe(0);
      expect(extract).not.toHaveBeenCalled();
    }
  );

  it("checks the file field before the job description", async () => {
    const { analyzer } = setup();
    await expect(analyzer.analyze({ file: null, jobDescription: "" })).rejects.toThrow(
      "Resume file is required"
    );
  });

  it("rejects an unsupported extension before reading", async () => {
    const { analyzer, extract, stages } = setup();
    const file = upload("resume.txt");

    await expect(analyzer.analyze({ file, jobDescription: JD })).rejects.toThrow(
      "Invalid file type. Allowed: pdf, docx"
    );
    expect(file.reads).toBe(0);
    expect(extract).not.toHaveBeenCalled();
    expect(stages).toEqual(["received", "failed"]);
  });

  it("stops before the model when too little text came out", async () => {
    const text = "x".repeat(MIN_TEXT_LENGTH - 1);
    const { analyzer, prompts, stages } = setup({ text: `  ${text}  ` });

    const err = await analyzer
      .analyze({ file: upload("scan.pdf"), jobDescription: JD })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InsufficientContentError);
    if (!(err instanceof InsufficientContentError)) return;
    expect(err.length).toBe(MIN_TEXT_LENGTH - 1);
    expect(err.status).toBe(400);
    expect(prompts).toHaveLength(0);
    expect(stages).toEqual(["received", "validated", "failed"]);
  });

  it("accepts text of exactly the minimum length", async () => {
    const { analyzer, prompts } = setup({ text: "y".repeat(MIN_TEXT_LENGTH) });

    await analyzer.analyze({ file: upload("cv.pdf"), jobDescription: JD });
    expect(prompts).toHaveLength(1);
  });

  it("surfaces model failures as AIInvocationError", async () => {
    const { model } = fakeModel(() => Promise.reject(new Error("503 overloaded")));
    const stages: AnalysisStage[] = [];
    const analyzer = createResumeAnalyzer({
      config: testConfig(),
      model,
      extractor: fakeExtractor(RESUME_TEXT).extractor,
      onStage: (s) => stages.push(s),
    });

    await expect(
      analyzer.analyze({ file: upload("cv.pdf"), jobDescription: JD })
    ).rejects.toBeInstanceOf(AIInvocationError);
    expect(stages).toEqual(["received", "validated", "text-extracted", "prompted", "failed"]);
  });

  it("surfaces unparseable replies as ResponseParseError", async () => {
    const { analyzer, stages } = setup({ reply: "I think this candidate is great." });

    await expect(
      analyzer.analyze({ file: upload("cv.pdf"), jobDescription: JD })
    ).rejects.toBeInstanceOf(ResponseParseError);
    expect(stages.at(-2)).toBe("ai-invoked");
    expect(stages.at(-1)).toBe("failed");
  });
});
