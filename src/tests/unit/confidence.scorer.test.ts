import assert from "node:assert/strict";
import { test } from "node:test";
import type { LogicalCheck } from "../../shared/types/pattern-bank.types";
import { computeConfidence, evaluateCheck, validateFields } from "../../validation/confidence.scorer";
import { bankFor, experienceEntry, extracted, loadFixtures, resultOf } from "../helpers";

const PAYSLIP_VALUES = {
  "components.basic": 10000,
  "components.hra": 4000,
  "components.variable_pay": 1000,
  "components.total_earnings": 20000,
  "components.net_pay": 18000,
  "components.deductions": 2000,
  "employment_proof.employee_name": "Ravi Kumar",
  "employment_proof.employee_id": "E1",
  "employment_proof.designation": "Analyst",
};

test("an itemized total that does not add up is an earnings anomaly", async () => {
  const { banks } = await loadFixtures();
  const report = validateFields(bankFor(banks, "payslip"), resultOf("payslip", PAYSLIP_VALUES));

  assert.deepEqual(report.logical_checks, { earnings_consistency: false, net_pay_consistency: true });
  assert.deepEqual(report.anomalies, [
    {
      type: "earnings_mismatch",
      check: "earnings_consistency",
      description:
        "Itemized components.basic + components.hra + components.variable_pay = 15000 differs from components.total_earnings 20000 by more than 1",
    },
  ]);
  assert.equal(report.confidence_score, 90.91);
});

test("an unresolved earnings component fails the check as a missing input", async () => {
  const { banks } = await loadFixtures();
  const report = validateFields(
    bankFor(banks, "payslip"),
    resultOf("payslip", { ...PAYSLIP_VALUES, "components.hra": null, "components.total_earnings": 11000 }),
  );

  assert.equal(report.logical_checks.earnings_consistency, false);
  assert.deepEqual(
    report.anomalies.find((anomaly) => anomaly.check === "earnings_consistency"),
    {
      type: "earnings_mismatch",
      check: "earnings_consistency",
      description: "Check earnings_consistency could not run: missing components.hra",
    },
  );
});

test("earnings tolerance absorbs rounding and is configurable", async () => {
  const { banks } = await loadFixtures();
  const bank = bankFor(banks, "payslip");
  const result = resultOf("payslip", {
    ...PAYSLIP_VALUES,
    "components.total_earnings": 15000.8,
    "components.net_pay": 13000.8,
  });

  assert.equal(validateFields(bank, result).logical_checks.earnings_consistency, true);
  assert.equal(validateFields(bank, result, { earningsTolerance: 0.5 }).logical_checks.earnings_consistency, false);
});

test("an empty extraction scores zero with one anomaly per gap", async () => {
  const { banks } = await loadFixtures();
  const bank = bankFor(banks, "experience_letter");
  const values = Object.fromEntries(bank.fields.map((field) => [field.name, null]));
  const report = validateFields(bank, resultOf("experience_letter", values));

  assert.equal(report.confidence_score, 0);
  assert.equal(report.anomalies.filter((anomaly) => anomaly.type === "missing_required_field").length, 8);
  assert.deepEqual(report.anomalies.slice(-3), [
    {
      type: "dates_illogical",
      check: "dates_logical",
      description: "Check dates_logical could not run: missing start_date, end_date",
    },
    {
      type: "start_date_in_future",
      check: "start_date_future",
      description: "Check start_date_future could not run: missing start_date",
    },
    {
      type: "start_date_implausible",
      check: "start_date_implausible",
      description: "Check start_date_implausible could not run: missing start_date",
    },
  ]);
});

test("a value of the wrong shape is flagged separately from a missing one", async () => {
  const { banks } = await loadFixtures();
  const report = validateFields(
    bankFor(banks, "experience_letter"),
    resultOf("experience_letter", { start_date: "2022-13-01", end_date: "2023-01-01" }),
  );

  assert.equal(report.per_field_validity.start_date, false);
  assert.deepEqual(
    report.anomalies.find((anomaly) => anomaly.field === "start_date"),
    {
      type: "invalid_field_shape",
      field: "start_date",
      description: "Field start_date does not look like a valid date: 2022-13-01",
    },
  );
});

test("start dates must strictly precede end dates", () => {
  const check: LogicalCheck = {
    name: "dates_logical",
    type: "date_order",
    anomaly: "dates_illogical",
    start: "start_date",
    end: "end_date",
  };

  assert.deepEqual(
    evaluateCheck(check, { start_date: extracted("2022-06-30"), end_date: extracted("2019-04-01") }, 1, 10),
    { passed: false, description: "start_date 2022-06-30 is not before end_date 2019-04-01" },
  );
  assert.equal(
    evaluateCheck(check, { start_date: extracted("2022-06-30"), end_date: extracted("2022-06-30") }, 1, 10).passed,
    false,
  );
  assert.equal(
    evaluateCheck(check, { start_date: extracted("2019-04-01"), end_date: extracted("2022-06-30") }, 1, 10).passed,
    true,
  );
});

test("GPA bounds follow the configured scale", async () => {
  const { banks } = await loadFixtures();
  const bank = bankFor(banks, "certificate");
  const result = resultOf("certificate", {
    university: "Northfield University",
    degree: "Bachelor of Science",
    gpa: 9.2,
    graduation_date: "2021-07-15",
  });

  assert.equal(validateFields(bank, result, { gpaScale: 10 }).confidence_score, 100);
  const strict = validateFields(bank, result, { gpaScale: 4 });
  assert.deepEqual(strict.anomalies, [
    { type: "gpa_out_of_range", check: "gpa_plausible", description: "gpa 9.2 is outside 0-4" },
  ]);
  assert.equal(strict.confidence_score, 80);
});

test("experience entries whose range runs backwards are flagged", async () => {
  const { banks } = await loadFixtures();
  const report = validateFields(
    bankFor(banks, "resume"),
    resultOf("resume", {
      "personal_info.email": "test@example.com",
      experience: [
        experienceEntry("Engineer", "Orbit Labs", "Mar 2022 - Jan 2020"),
        experienceEntry("Intern", "Pixel Forge", "Jan 2019 - Present"),
      ],
    }),
  );

  assert.equal(report.logical_checks.contact_present, true);
  assert.deepEqual(
    report.anomalies.find((anomaly) => anomaly.type === "experience_dates_illogical"),
    {
      type: "experience_dates_illogical",
      check: "experience_dates_logical",
      description: "Date ranges end before they start: Mar 2022 - Jan 2020",
    },
  );
});

test("confidence is a clamped percentage with an empty denominator scoring zero", () => {
  assert.equal(computeConfidence(0, 0), 0);
  assert.equal(computeConfidence(3, 4), 75);
  assert.equal(computeConfidence(2, 3), 66.67);
  assert.equal(computeConfidence(5, 4), 100);
});

test("start dates are bounded by the reference date", async () => {
  const { banks } = await loadFixtures();
  const bank = bankFor(banks, "experience_letter");
  const letter = (startDate: string) =>
    resultOf("experience_letter", { start_date: startDate, end_date: "2023-03-31" });

  const future = validateFields(bank, letter("2025-02-01"), { asOf: "2024-01-01" });
  assert.equal(future.logical_checks.start_date_future, false);
  assert.deepEqual(
    future.anomalies.find((anomaly) => anomaly.type === "start_date_in_future"),
    {
      type: "start_date_in_future",
      check: "start_date_future",
      description: "start_date 2025-02-01 is after 2024-01-01",
    },
  );

  const ancient = validateFields(bank, letter("1970-05-01"), { asOf: "2024-01-01" });
  assert.deepEqual(ancient.logical_checks, {
    dates_logical: true,
    start_date_future: true,
    start_date_implausible: false,
  });
  assert.deepEqual(
    ancient.anomalies.find((anomaly) => anomaly.type === "start_date_implausible"),
    {
      type: "start_date_implausible",
      check: "start_date_implausible",
      description: "start_date 1970-05-01 is more than 50 years before 2024-01-01",
    },
  );
});

test("a date window accepts the reference date itself and the last day inside the bound", () => {
  const notFuture: LogicalCheck = {
    name: "start_date_future",
    type: "date_window",
    anomaly: "start_date_in_future",
    field: "start_date",
    maxYearsBefore: null,
    maxYearsAfter: 0,
  };
  const notAncient: LogicalCheck = {
    name: "start_date_implausible",
    type: "date_window",
    anomaly: "start_date_implausible",
    field: "start_date",
    maxYearsBefore: 50,
    maxYearsAfter: null,
  };
  const fieldsAt = (date: string) => ({ start_date: extracted(date) });

  assert.equal(evaluateCheck(notFuture, fieldsAt("2024-01-01"), 1, 10, "2024-01-01").passed, true);
  assert.equal(evaluateCheck(notFuture, fieldsAt("2024-01-02"), 1, 10, "2024-01-01").passed, false);
  assert.equal(evaluateCheck(notAncient, fieldsAt("1974-01-01"), 1, 10, "2024-01-01").passed, true);
  assert.equal(evaluateCheck(notAncient, fieldsAt("1973-12-01"), 1, 10, "2024-01-01").passed, false);
});
