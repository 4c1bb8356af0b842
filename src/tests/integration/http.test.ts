import assert from "node:assert/strict";
import type { Server } from "node:http";
import { after, before, test } from "node:test";
import { createApp } from "../../app";
import { loadEnv } from "../../config/env";
import { isRecord } from "../../shared/utils/records";
import { loadFixtures, silentLogger } from "../helpers";

const PAYSLIP = [
  "Employee Name: Meera Nair",
  "Emp Code: 7781",
  "Designation: Analyst",
  "Basic: 15000, HRA: 5000, Variable Pay: 3000, Net Pay: 20000",
].join("\n");

const CERTIFICATE = [
  "Northfield University",
  "Bachelor of Technology in Computer Science",
  "with a CGPA of 8.45 / 10",
  "Date of Award: 15th July 2021",
].join("\n");

const BACKEND_JOB = {
  title: "Backend Engineer",
  required_skills: ["Node.js", "PostgreSQL", "Docker"],
};

let server: Server;
let baseUrl = "";

before(async () => {
  const { banks, lexicons } = await loadFixtures();
  const { app } = createApp({ env: loadEnv({}), banks, lexicons, logger: silentLogger });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server has no port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

function pick(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (typeof key === "number" && Array.isArray(current)) {
      current = current[key];
    } else if (typeof key === "string" && isRecord(current)) {
      current = current[key];
    } else {
      return undefined;
    }
  }
  return current;
}

async function request(method: "GET" | "POST", path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: { "content-type": "application/json" },
    body: typeof body === "string" ? body : body === undefined ? undefined : JSON.stringify(body),
  });
  const parsed: unknown = await response.json();
  return { status: response.status, body: parsed };
}

test("health lists the loaded kinds", async () => {
  const { status, body } = await request("GET", "/health");

  assert.equal(status, 200);
  assert.deepEqual(pick(body, "kinds"), ["resume", "payslip", "experience_letter", "certificate"]);
  assert.equal(pick(body, "bank_versions", "payslip"), "2024.06.1");
});

test("extracts a payslip from text", async () => {
  const { status, body } = await request("POST", "/documents/payslip/extract", { text: PAYSLIP });

  assert.equal(status, 200);
  assert.equal(pick(body, "result", "fields", "fields", "components.total_earnings", "value"), 23000);
  assert.equal(pick(body, "result", "confidence"), 100);
});

test("rejects unknown kinds and missing text", async () => {
  const unknownKind = await request("POST", "/documents/unknown/extract", { text: PAYSLIP });
  assert.equal(unknownKind.status, 404);
  assert.deepEqual(unknownKind.body, { ok: false, error: "Unknown document kind: unknown" });

  const missing = await request("POST", "/documents/payslip/extract", {});
  assert.equal(missing.status, 400);
  assert.deepEqual(missing.body, { ok: false, error: "text must be a non-empty string" });
});

test("batch reports each document separately", async () => {
  const { status, body } = await request("POST", "/documents/batch", {
    documents: [
      { kind: "payslip", text: PAYSLIP },
      { kind: "certificate", fileName: "cert.txt", contentBase64: Buffer.from(CERTIFICATE).toString("base64") },
      { kind: "certificate", fileName: "scan.png", mimeType: "image/png", contentBase64: "iVBORw0KGgo=" },
    ],
  });

  assert.equal(status, 200);
  assert.equal(pick(body, "records", 0, "source_path"), "document-1");
  assert.equal(pick(body, "records", 0, "ok"), true);
  assert.equal(pick(body, "records", 1, "result", "fields", "fields", "university", "value"), "Northfield University");
  assert.deepEqual(pick(body, "records", 2), {
    source_path: "scan.png",
    document_kind: "certificate",
    ok: false,
    extraction_failure: "ocr_unavailable",
  });
});

test("ranks resumes against a job", async () => {
  const { status, body } = await request("POST", "/resumes/rank", {
    job: BACKEND_JOB,
    threshold: 30,
    candidates: [
      { candidate_ref: "bob", text: "Bob Tran\nbob@example.com\n\nSkills\nExcel, Tableau" },
      { candidate_ref: "alice", text: "Alice Moreau\nalice@example.com\n\nSkills\nNode.js, PostgreSQL, Docker" },
    ],
  });

  assert.equal(status, 200);
  assert.equal(pick(body, "ranked", 0, "candidate_ref"), "alice");
  assert.equal(pick(body, "ranked", 0, "rank"), 1);
  assert.equal(pick(body, "ranked", 0, "fit_score", "skills_match"), 100);
  assert.equal(pick(body, "ranked", 0, "shortlisted"), true);
  assert.equal(pick(body, "ranked", 1, "candidate_ref"), "bob");
  assert.equal(pick(body, "ranked", 1, "fit_score", "skills_match"), 0);
});

test("refuses to score a cover letter as a resume", async () => {
  const { status, body } = await request("POST", "/resumes/score", {
    job: BACKEND_JOB,
    text: "Dear Hiring Manager,\nI am applying for the Backend Engineer position. I believe this opportunity lets me contribute.",
  });

  assert.equal(status, 422);
  assert.deepEqual(body, { ok: false, error: "document looks like a cover_letter, not a resume" });
});

test("a reference date that is not a real calendar day is a 400", async () => {
  const { status, body } = await request("POST", "/resumes/score", {
    job: BACKEND_JOB,
    asOf: "2024-13-45",
    text: "Alice Moreau\nalice@example.com\n\nSkills\nNode.js",
  });

  assert.equal(status, 400);
  assert.deepEqual(body, { ok: false, error: "asOf must be a YYYY-MM-DD date" });

  const extraction = await request("POST", "/documents/payslip/extract", {
    text: PAYSLIP,
    options: { asOf: "2023-02-29" },
  });
  assert.equal(extraction.status, 400);
  assert.deepEqual(extraction.body, { ok: false, error: "options.asOf must be a YYYY-MM-DD date" });
});

test("malformed JSON is a 400", async () => {
  const { status, body } = await request("POST", "/documents/payslip/extract", "{bad");

  assert.equal(status, 400);
  assert.deepEqual(body, { ok: false, error: "Malformed request" });
});
