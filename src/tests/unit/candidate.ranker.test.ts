import assert from "node:assert/strict";
import { test } from "node:test";
import { rankCandidates } from "../../scoring/candidate.ranker";
import type { CandidateInput, JobDescription } from "../../shared/types/scoring.types";
import { loadFixtures, resultOf } from "../helpers";

const DATA_JOB: JobDescription = {
  title: "Data Engineer",
  keywords: [],
  required_skills: ["Python", "Spark", "Airflow", "Kafka"],
  required_degree: null,
  required_field: null,
  related_fields: [],
  min_average_tenure_months: 6,
};

function candidateWith(ref: string, skills: string[]): CandidateInput {
  return { candidate_ref: ref, fields: resultOf("resume", { "skills.technical": skills }) };
}

const POOL: CandidateInput[] = [
  candidateWith("B", ["Python", "Spark"]),
  candidateWith("A", ["Python", "Spark", "Airflow", "Kafka"]),
  candidateWith("C", ["Airflow", "Kafka"]),
  candidateWith("D", ["Excel"]),
];

test("orders by total fit and keeps input order on ties", async () => {
  const { lexicons } = await loadFixtures();
  const ranked = rankCandidates(POOL, DATA_JOB, lexicons, { threshold: 20 });

  assert.deepEqual(
    ranked.map((item) => [item.candidate_ref, item.rank, item.fit_score.total_fit, item.shortlisted]),
    [
      ["A", 1, 42.5, true],
      ["B", 2, 22.5, true],
      ["C", 3, 22.5, true],
      ["D", 4, 2.5, false],
    ],
  );
});

test("a candidate's total fit does not depend on where it sits in the pool", async () => {
  const { lexicons } = await loadFixtures();
  const totalsOf = (pool: CandidateInput[]) =>
    new Map(rankCandidates(pool, DATA_JOB, lexicons).map((item) => [item.candidate_ref, item.fit_score.total_fit]));

  const original = totalsOf(POOL);
  assert.deepEqual(totalsOf([...POOL].reverse()), original);
  assert.deepEqual(totalsOf([POOL[2], POOL[0], POOL[3], POOL[1]]), original);
  assert.deepEqual(
    ["A", "B", "C", "D"].map((ref) => original.get(ref)),
    [42.5, 22.5, 22.5, 2.5],
  );
});

test("tied candidates swap ranks when their submission order swaps", async () => {
  const { lexicons } = await loadFixtures();
  const ranked = rankCandidates([POOL[2], POOL[0]], DATA_JOB, lexicons);

  assert.deepEqual(
    ranked.map((item) => [item.candidate_ref, item.rank]),
    [
      ["C", 1],
      ["B", 2],
    ],
  );
});

test("caps the list after ranking", async () => {
  const { lexicons } = await loadFixtures();
  const ranked = rankCandidates(POOL, DATA_JOB, lexicons, { threshold: 20, maxCandidates: 2 });

  assert.deepEqual(
    ranked.map((item) => item.candidate_ref),
    ["A", "B"],
  );
});

test("the default threshold shortlists nobody below 70", async () => {
  const { lexicons } = await loadFixtures();
  const ranked = rankCandidates(POOL, DATA_JOB, lexicons);

  assert.equal(ranked.filter((item) => item.shortlisted).length, 0);
  assert.equal(ranked.length, 4);
});

test("an empty pool ranks to an empty list", async () => {
  const { lexicons } = await loadFixtures();
  assert.deepEqual(rankCandidates([], DATA_JOB, lexicons), []);
});
