import assert from "node:assert/strict";
import { test } from "node:test";
import type { Logger } from "../../config/logger";
import { DocumentEngine, type EngineSettings } from "../../engine/document.engine";
import type { AcquisitionResult, DocumentSource, TextAcquirer } from "../../shared/types/document.types";
import type { PatternBankRegistry } from "../../shared/types/pattern-bank.types";
import { sha256Hex } from "../../shared/utils/hashing";
import { loadFixtures, resultOf, silentLogger } from "../helpers";

const SETTINGS: EngineSettings = {
  earningsTolerance: 1,
  gpaScale: 10,
  shortlistThreshold: 70,
  maxCandidates: null,
  batchConcurrency: 2,
};

const PAYSLIP = [
  "Employee Name: Meera Nair",
  "Emp Code: 7781",
  "Designation: Analyst",
  "Basic: 15000, HRA: 5000, Variable Pay: 3000, Net Pay: 20000",
].join("\n");

const RESUME = [
  "Aditi Verma",
  "aditi.verma@example.com",
  "",
  "Experience",
  "Software Engineer | Orbit Labs | Jan 2021 - Present",
  "",
  "Education",
  "B.Tech in Computer Science, Riverdale University, 2014 - 2018",
  "",
  "Skills",
  "Python, Docker",
].join("\n");

interface LogLine {
  level: string;
  message: string;
  meta?: Record<string, unknown>;
}

function capturingLogger(lines: LogLine[]): Logger {
  return {
    debug: (message, meta) => lines.push({ level: "debug", message, meta }),
    info: (message, meta) => lines.push({ level: "info", message, meta }),
    warn: (message, meta) => lines.push({ level: "warn", message, meta }),
    error: (message, meta) => lines.push({ level: "error", message, meta }),
  };
}

async function buildEngine(logger: Logger = silentLogger, banks?: PatternBankRegistry): Promise<DocumentEngine> {
  const fixtures = await loadFixtures();
  return new DocumentEngine(banks ?? fixtures.banks, fixtures.lexicons, SETTINGS, logger);
}

test("extract runs normalization, extraction and validation together", async () => {
  const engine = await buildEngine();
  const outcome = engine.extract("payslip", PAYSLIP);

  assert.equal(outcome.ok, true);
  if (outcome.ok) {
    assert.equal(outcome.result.kind, "payslip");
    assert.equal(outcome.result.confidence, 100);
    assert.equal(outcome.result.fields.fields["components.total_earnings"].value, 23000);
    assert.equal(outcome.result.classification, undefined);
  }
});

test("a kind without a loaded bank is reported, not thrown", async () => {
  const { banks } = await loadFixtures();
  const partial: PatternBankRegistry = new Map(Array.from(banks).filter(([kind]) => kind !== "certificate"));
  const engine = await buildEngine(silentLogger, partial);

  assert.deepEqual(engine.supportedKinds(), ["resume", "payslip", "experience_letter"]);
  assert.deepEqual(engine.extract("certificate", "Northfield University"), {
    ok: false,
    error_code: "kind_unavailable",
    message: "No pattern bank loaded for certificate",
  });
});

test("resumes are classified and optionally anonymized", async () => {
  const engine = await buildEngine();
  const outcome = engine.extract("resume", RESUME, { anonymize: true });

  assert.equal(outcome.ok, true);
  if (outcome.ok) {
    assert.equal(outcome.result.classification?.document_class, "resume");
    assert.equal(outcome.result.anonymized?.fields["personal_info.name"].value, "[NAME REDACTED]");
    assert.equal(outcome.result.fields.fields["personal_info.name"].value, "Aditi Verma");
  }
});

test("certificates carry an authenticity block built from acquisition metadata", async () => {
  const engine = await buildEngine();
  const text = "Northfield University\nBachelor of Science\nCGPA 8.4\nDate of Award: 15th July 2021";

  const typed = engine.extract("certificate", text);
  assert.equal(typed.ok, true);
  if (typed.ok) {
    assert.equal(typed.result.authenticity?.document_hash, sha256Hex(text));
    assert.equal(typed.result.authenticity?.metadata, null);
    assert.equal(typed.result.authenticity?.authenticity_score, 10);
  }

  const uploaded = engine.extract("certificate", text, {
    contentHash: "test-hash",
    metadata: { producer: "DocuSign", creator: null, creation_date: null, page_count: 1 },
  });
  assert.equal(uploaded.ok, true);
  if (uploaded.ok) {
    assert.equal(uploaded.result.authenticity?.document_hash, "test-hash");
    assert.deepEqual(uploaded.result.authenticity?.signing_tools, ["docusign"]);
    assert.equal(uploaded.result.authenticity?.authenticity_score, 40);
  }

  const payslip = engine.extract("payslip", PAYSLIP);
  assert.equal(payslip.ok && payslip.result.authenticity, undefined);
});

test("experience letters are checked against the requested reference date", async () => {
  const engine = await buildEngine();
  const letter = [
    "Bluewave Technologies Pvt Ltd",
    "This is to certify that Mr. Karan Mehta was employed with us as a Software Engineer from 01/04/2019 to 30/06/2022.",
  ].join("\n");

  const early = engine.extract("experience_letter", letter, { asOf: "2019-01-01" });
  const later = engine.extract("experience_letter", letter, { asOf: "2024-01-01" });
  assert.equal(early.ok && early.result.validation.logical_checks.start_date_future, false);
  assert.equal(later.ok && later.result.validation.logical_checks.start_date_future, true);
});

test("extraction logs the kind, bank version and confidence", async () => {
  const lines: LogLine[] = [];
  const engine = await buildEngine(capturingLogger(lines));
  engine.extract("payslip", PAYSLIP);

  const line = lines.find((item) => item.message === "document.extracted");
  assert.equal(line?.level, "info");
  assert.equal(line?.meta?.document_kind, "payslip");
  assert.equal(line?.meta?.bank_version, "2024.06.1");
  assert.equal(line?.meta?.confidence, 100);
});

test("batch keeps submission order and isolates failures", async () => {
  const engine = await buildEngine();
  let inFlight = 0;
  let peak = 0;
  const outcomes = new Map<string, AcquisitionResult | Error>([
    ["a.txt", { ok: true, rawText: PAYSLIP }],
    ["b.txt", { ok: false, reason: "empty_text" }],
    ["c.pdf", { ok: false, reason: "read_failed", detail: "boom" }],
    ["d.txt", new Error("disk gone")],
    ["e.txt", { ok: true, rawText: RESUME }],
  ]);
  const acquirer: TextAcquirer = {
    acquire: async (source: DocumentSource): Promise<AcquisitionResult> => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise<void>((resolve) => setImmediate(resolve));
      inFlight -= 1;
      const outcome = outcomes.get(source.sourcePath);
      if (!outcome || outcome instanceof Error) {
        throw outcome ?? new Error("unexpected source");
      }
      return outcome;
    },
  };
  const sources: DocumentSource[] = [
    { sourcePath: "a.txt", kind: "payslip" },
    { sourcePath: "b.txt", kind: "payslip" },
    { sourcePath: "c.pdf", kind: "certificate" },
    { sourcePath: "d.txt", kind: "experience_letter" },
    { sourcePath: "e.txt", kind: "resume" },
  ];

  const records = await engine.processBatch(sources, acquirer);

  assert.deepEqual(
    records.map((record) => [record.source_path, record.ok ? "ok" : record.extraction_failure]),
    [
      ["a.txt", "ok"],
      ["b.txt", "empty_text"],
      ["c.pdf", "read_failed: boom"],
      ["d.txt", "disk gone"],
      ["e.txt", "ok"],
    ],
  );
  assert.ok(peak <= 2);
});

test("rank falls back to configured threshold and cap", async () => {
  const engine = await buildEngine();
  const job = {
    title: "Data Engineer",
    keywords: [],
    required_skills: ["Python"],
    required_degree: null,
    required_field: null,
    related_fields: [],
    min_average_tenure_months: 6,
  };
  const candidates = [
    { candidate_ref: "x", fields: resultOf("resume", { "skills.technical": ["Excel"] }) },
    { candidate_ref: "y", fields: resultOf("resume", { "skills.technical": ["Python"] }) },
  ];

  const ranked = engine.rank(candidates, job, { maxCandidates: 1 });
  assert.deepEqual(
    ranked.map((item) => [item.candidate_ref, item.fit_score.total_fit, item.shortlisted]),
    [["y", 42.5, false]],
  );
});
