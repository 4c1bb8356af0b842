import assert from "node:assert/strict";
import { test } from "node:test";
import { extractFields } from "../../extraction/field-extraction.engine";
import { normalizeText } from "../../normalization/text.normalizer";
import type { DocumentKind } from "../../shared/types/document.types";
import type { FieldExtractionResult } from "../../shared/types/extraction.types";
import { validateFields } from "../../validation/confidence.scorer";
import { bankFor, loadFixtures } from "../helpers";

async function extract(kind: DocumentKind, text: string): Promise<FieldExtractionResult> {
  const { banks, lexicons } = await loadFixtures();
  return extractFields(bankFor(banks, kind), normalizeText(text), { lexicons });
}

function valueOf(result: FieldExtractionResult, name: string): unknown {
  return result.fields[name]?.value;
}

test("payslip with every component labelled resolves explicitly", async () => {
  const result = await extract(
    "payslip",
    [
      "Acme Payroll Services",
      "Payslip for June 2024",
      "Employee Name: Ravi Kumar",
      "Employee ID: EMP-1042",
      "Designation: Senior Analyst",
      "Basic Salary: 12,000",
      "HRA: 6,000",
      "Special Allowance: 5,000",
      "Gross Earnings: 23,000",
      "Total Deductions: 2,500",
      "Net Pay: 20,500",
    ].join("\n"),
  );

  assert.equal(valueOf(result, "components.basic"), 12000);
  assert.equal(valueOf(result, "components.hra"), 6000);
  assert.deepEqual(result.fields["components.variable_pay"], {
    value: 5000,
    raw_matches: ["5000"],
    extraction_method: "explicit_pattern",
    rule_id: "variable_pay_allowance",
  });
  assert.equal(valueOf(result, "components.total_earnings"), 23000);
  assert.equal(valueOf(result, "components.net_pay"), 20500);
  assert.deepEqual(result.fields["components.deductions"].raw_matches, ["2500"]);
  assert.equal(valueOf(result, "employment_proof.employee_name"), "Ravi Kumar");
  assert.equal(valueOf(result, "employment_proof.employee_id"), "EMP-1042");
  assert.equal(valueOf(result, "employment_proof.designation"), "Senior Analyst");
});

test("payslip without a stated total computes it from the components", async () => {
  const { banks } = await loadFixtures();
  const result = await extract(
    "payslip",
    [
      "Employee Name: Meera Nair",
      "Emp Code: 7781",
      "Designation: Analyst",
      "Basic: 15000, HRA: 5000, Variable Pay: 3000, Net Pay: 20000",
    ].join("\n"),
  );

  assert.deepEqual(result.fields["components.total_earnings"], {
    value: 23000,
    raw_matches: [],
    extraction_method: "computed",
    rule_id: "total_earnings_from_components",
  });
  assert.equal(result.fields["components.net_pay"].extraction_method, "explicit_pattern");
  assert.equal(valueOf(result, "components.net_pay"), 20000);
  assert.deepEqual(result.fields["components.deductions"], {
    value: 3000,
    raw_matches: [],
    extraction_method: "computed",
    rule_id: "deductions_from_net_pay",
  });
  assert.equal(valueOf(result, "employment_proof.employee_id"), "7781");

  const report = validateFields(bankFor(banks, "payslip"), result);
  assert.equal(report.confidence_score, 100);
  assert.deepEqual(report.anomalies, []);
});

test("payslip net pay falls back to the largest amount near the bottom", async () => {
  const result = await extract(
    "payslip",
    [
      "Employee Name: Arjun Rao",
      "Employee ID: E77",
      "Basic Pay: 9000",
      "Designation: Clerk",
      "Deductions: 800",
      "Remarks: paid by transfer",
      "Reference 4471",
      "Amount payable this month",
      "8200",
      "Thank you",
    ].join("\n"),
  );

  assert.deepEqual(result.fields["components.net_pay"], {
    value: 8200,
    raw_matches: ["8200"],
    extraction_method: "fallback_heuristic",
    rule_id: "fallback:largest_amount_in_last_lines",
  });
  assert.equal(valueOf(result, "components.deductions"), 800);
  assert.equal(valueOf(result, "components.total_earnings"), 9000);
  assert.equal(result.fields["components.hra"].extraction_method, "unresolved");
});

test("experience letter resolves names, dates and the computed duration", async () => {
  const result = await extract(
    "experience_letter",
    [
      "Bluewave Technologies Pvt Ltd",
      "Date: 10/08/2023",
      "TO WHOM IT MAY CONCERN",
      "This is to certify that Mr. Karan Mehta was employed with us as a Software Engineer from 01/04/2019 to 30/06/2022.",
      "Reporting Manager: Ms. Anita Desai",
      "Contact: anita.desai@example.com",
    ].join("\n"),
  );

  assert.equal(valueOf(result, "employee_name"), "Karan Mehta");
  assert.equal(valueOf(result, "job_title"), "Software Engineer");
  assert.equal(valueOf(result, "org_name"), "Bluewave Technologies Pvt Ltd");
  assert.equal(valueOf(result, "start_date"), "2019-04-01");
  assert.equal(valueOf(result, "end_date"), "2022-06-30");
  assert.deepEqual(result.fields.duration_years, {
    value: 3.25,
    raw_matches: [],
    extraction_method: "computed",
    rule_id: "duration_from_dates",
  });
  assert.equal(valueOf(result, "manager_name"), "Anita Desai");
  assert.equal(valueOf(result, "manager_contact"), "anita.desai@example.com");
});

test("certificate resolves institution, degree, GPA and award date", async () => {
  const result = await extract(
    "certificate",
    [
      "Northfield University",
      "This is to certify that Priya Sharma has been awarded the degree of",
      "Bachelor of Technology in Computer Science",
      "with a CGPA of 8.45 / 10",
      "Date of Award: 15th July 2021",
    ].join("\n"),
  );

  assert.equal(valueOf(result, "university"), "Northfield University");
  assert.equal(valueOf(result, "degree"), "Bachelor of Technology in Computer Science");
  assert.equal(valueOf(result, "gpa"), 8.45);
  assert.equal(valueOf(result, "graduation_date"), "2021-07-15");
});

test("a field with no match at all is unresolved rather than an error", async () => {
  const result = await extract("certificate", "Completely unrelated memo text");

  assert.deepEqual(result.fields.gpa, {
    value: null,
    raw_matches: [],
    extraction_method: "unresolved",
    rule_id: null,
  });
  assert.equal(result.kind, "certificate");
  assert.equal(result.bank_version, "2024.06.1");
});

test("extraction is deterministic for identical input", async () => {
  const text = "Employee Name: Ravi Kumar\nBasic: 1000\nNet Pay: 900";
  assert.deepEqual(await extract("payslip", text), await extract("payslip", text));
});

function letterWithDates(from: string, to: string): string {
  return [
    "Bluewave Technologies Pvt Ltd",
    "Date: 10/08/2023",
    "TO WHOM IT MAY CONCERN",
    `This is to certify that Mr. Karan Mehta was employed with us as a Software Engineer from ${from} to ${to}.`,
    "Reporting Manager: Ms. Anita Desai",
    "Contact: anita.desai@example.com",
  ].join("\n");
}

test("a letter running June 2019 to August 2022 lasts 3.25 years and passes every check", async () => {
  const { banks } = await loadFixtures();
  const result = await extract("experience_letter", letterWithDates("01/06/2019", "31/08/2022"));

  assert.equal(valueOf(result, "start_date"), "2019-06-01");
  assert.equal(valueOf(result, "end_date"), "2022-08-31");
  assert.equal(valueOf(result, "duration_years"), 3.25);

  const report = validateFields(bankFor(banks, "experience_letter"), result, { asOf: "2024-01-01" });
  assert.deepEqual(report.logical_checks, {
    dates_logical: true,
    start_date_future: true,
    start_date_implausible: true,
  });
  assert.deepEqual(report.anomalies, []);
  assert.equal(report.confidence_score, 100);
});

test("a letter whose dates run backwards is flagged as illogical", async () => {
  const { banks } = await loadFixtures();
  const result = await extract("experience_letter", letterWithDates("30/06/2022", "01/04/2019"));

  assert.equal(valueOf(result, "start_date"), "2022-06-30");
  assert.equal(valueOf(result, "end_date"), "2019-04-01");

  const report = validateFields(bankFor(banks, "experience_letter"), result, { asOf: "2024-01-01" });
  assert.equal(report.logical_checks.dates_logical, false);
  assert.deepEqual(
    report.anomalies.find((anomaly) => anomaly.type === "dates_illogical"),
    {
      type: "dates_illogical",
      check: "dates_logical",
      description: "start_date 2022-06-30 is not before end_date 2019-04-01",
    },
  );
});
