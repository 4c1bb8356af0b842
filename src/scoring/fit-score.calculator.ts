import { hasLexiconTerm, normalizeFieldName, type Lexicons } from "../extraction/lexicons";
import type {
  EducationEntry,
  ExperienceEntry,
  FieldExtractionResult,
} from "../shared/types/extraction.types";
import { isEducationEntry, isExperienceEntry } from "../shared/types/extraction.types";
import type { DegreeLevel, FitCriteria, FitScore, JobDescription, ScoreOptions } from "../shared/types/scoring.types";
import {
  compareIsoDates,
  monthsBetween,
  parseDateRange,
  resolveRangeEnd,
  type DateRange,
} from "../shared/utils/dates";
import { clampScore, countOverlap, normalizeTechName, phraseOf, round2, tokenize } from "../shared/utils/scoring.util";

export const FIT_WEIGHTS = {
  skills_match: 0.4,
  experience_relevance: 0.3,
  education_match: 0.2,
  tenure_stability: 0.05,
  growth_trajectory: 0.05,
} as const satisfies Record<keyof FitCriteria, number>;

const DEGREE_RANK: Record<DegreeLevel, number> = {
  diploma: 0,
  bachelor: 1,
  master: 2,
  doctorate: 3,
};

const TITLE_WEIGHT = 0.6;
const KEYWORD_WEIGHT = 0.4;
// Matching this many job keywords in one role counts as full keyword relevance.
const KEYWORD_SATURATION = 5;
const RELATED_FIELD_FACTOR = 0.6;
const UNRELATED_FIELD_FACTOR = 0.3;

export interface DatedEntry {
  entry: ExperienceEntry;
  range: DateRange | null;
}

export function scoreCandidate(
  fields: FieldExtractionResult,
  job: JobDescription,
  lexicons: Lexicons,
  options: ScoreOptions = {},
): FitScore {
  const experience = recentFirst(readList(fields, "experience").filter(isExperienceEntry));
  const education = readList(fields, "education").filter(isEducationEntry);
  const asOf = options.asOf ?? latestExplicitDate(experience, education);

  return combineFitScore({
    skills_match: scoreSkillsMatch(candidateSkills(fields), job),
    experience_relevance: scoreExperienceRelevance(experience, job),
    education_match: scoreEducationMatch(education, job, lexicons),
    tenure_stability: scoreTenureStability(experience, job, asOf),
    growth_trajectory: scoreGrowthTrajectory(experience, lexicons),
  });
}

export function combineFitScore(criteria: FitCriteria): FitScore {
  const total =
    FIT_WEIGHTS.skills_match * criteria.skills_match +
    FIT_WEIGHTS.experience_relevance * criteria.experience_relevance +
    FIT_WEIGHTS.education_match * criteria.education_match +
    FIT_WEIGHTS.tenure_stability * criteria.tenure_stability +
    FIT_WEIGHTS.growth_trajectory * criteria.growth_trajectory;
  return {
    ...criteria,
    total_fit: clampScore(round2(total)),
  };
}

export function scoreSkillsMatch(candidate: ReadonlyArray<string>, job: JobDescription): number {
  const owned = new Set(candidate.map((skill) => normalizeTechName(skill)));
  if (job.required_skills.length === 0) {
    return owned.size > 0 ? 50 : 0;
  }
  const required = Array.from(new Set(job.required_skills.map((skill) => normalizeTechName(skill))));
  const matched = required.filter((skill) => owned.has(skill)).length;
  return round2((matched / required.length) * 100);
}

export function scoreExperienceRelevance(
  experience: ReadonlyArray<DatedEntry>,
  job: JobDescription,
): number {
  if (experience.length === 0) {
    return 0;
  }
  const titleTokens = tokenize(job.title);
  const keywords = new Set(job.keywords.map((keyword) => phraseOf(keyword)).filter((keyword) => keyword.length > 0));
  const saturation = Math.min(KEYWORD_SATURATION, keywords.size);

  let weighted = 0;
  let totalWeight = 0;
  experience.forEach(({ entry }, index) => {
    const titleFactor =
      titleTokens.size > 0 ? countOverlap(tokenize(entry.title ?? ""), titleTokens) / titleTokens.size : 0;
    const entryPhrase = ` ${phraseOf([entry.title ?? "", ...entry.achievements].join(" "))} `;
    const matched = Array.from(keywords).filter((keyword) => entryPhrase.includes(` ${keyword} `)).length;
    const keywordFactor = saturation > 0 ? Math.min(1, matched / saturation) : 0;
    // Most recent role first, weighted 1, 1/2, 1/3...
    const weight = 1 / (index + 1);
    weighted += weight * (TITLE_WEIGHT * titleFactor + KEYWORD_WEIGHT * keywordFactor);
    totalWeight += weight;
  });

  return clampScore(round2((weighted / totalWeight) * 100));
}

export function scoreEducationMatch(
  education: ReadonlyArray<EducationEntry>,
  job: JobDescription,
  lexicons: Lexicons,
): number {
  if (education.length === 0) {
    return 0;
  }

  let levelFactor = 1;
  if (job.required_degree) {
    const best = Math.max(
      ...education.map((entry) => {
        const level = degreeLevelOf(entry.degree ?? "", lexicons);
        return level ? DEGREE_RANK[level] : -1;
      }),
    );
    const required = DEGREE_RANK[job.required_degree];
    levelFactor = best < 0 ? 0 : best >= required ? 1 : best === required - 1 ? 0.5 : 0;
  }

  let fieldFactor = 1;
  if (job.required_field) {
    fieldFactor = Math.max(...education.map((entry) => fieldFactorOf(entry, job)));
  }

  return round2(levelFactor * fieldFactor * 100);
}

export function scoreTenureStability(
  experience: ReadonlyArray<DatedEntry>,
  job: JobDescription,
  asOf: string | null,
): number {
  const durations: number[] = [];
  for (const { range } of experience) {
    if (!range) {
      continue;
    }
    const end = resolveRangeEnd(range, asOf);
    if (!end || compareIsoDates(range.start, end) > 0) {
      continue;
    }
    durations.push(monthsBetween(range.start, end));
  }
  if (durations.length === 0) {
    return 50;
  }

  const average = durations.reduce((total, value) => total + value, 0) / durations.length;
  if (average < job.min_average_tenure_months) {
    return 40;
  }
  if (average < 12) {
    return 70;
  }
  if (average < 24) {
    return 85;
  }
  return 100;
}

export function scoreGrowthTrajectory(experience: ReadonlyArray<DatedEntry>, lexicons: Lexicons): number {
  const ranks = experience
    .map(({ entry }) => entry.title)
    .filter((title): title is string => Boolean(title))
    .map((title) => seniorityRank(title, lexicons))
    .reverse();
  if (ranks.length === 0) {
    return 0;
  }
  if (ranks.length === 1) {
    return 50;
  }

  let steps = 0;
  for (let index = 1; index < ranks.length; index += 1) {
    steps += ranks[index] > ranks[index - 1] ? 1 : ranks[index] === ranks[index - 1] ? 0.5 : 0;
  }
  return round2((steps / (ranks.length - 1)) * 100);
}

export function seniorityRank(title: string, lexicons: Lexicons): number {
  const matched = lexicons.seniority.ranks.filter(({ term }) => term.pattern.test(title)).map(({ rank }) => rank);
  return matched.length > 0 ? Math.max(...matched) : lexicons.seniority.defaultRank;
}

export function degreeLevelOf(degree: string, lexicons: Lexicons): DegreeLevel | null {
  const found = lexicons.degreeLevels.find(({ terms }) => hasLexiconTerm(degree, terms));
  return found ? found.level : null;
}

function fieldFactorOf(entry: EducationEntry, job: JobDescription): number {
  const required = job.required_field ? normalizeFieldName(job.required_field) : "";
  const candidate = normalizeFieldName(entry.field ?? "");
  if (!required || !candidate) {
    return UNRELATED_FIELD_FACTOR;
  }
  if (candidate === required || candidate.includes(required) || required.includes(candidate)) {
    return 1;
  }
  const related = job.related_fields.map((field) => normalizeFieldName(field));
  if (related.some((field) => candidate === field || candidate.includes(field) || field.includes(candidate))) {
    return RELATED_FIELD_FACTOR;
  }
  return UNRELATED_FIELD_FACTOR;
}

function candidateSkills(fields: FieldExtractionResult): string[] {
  return [...readList(fields, "skills.technical"), ...readList(fields, "skills.soft")].filter(
    (item): item is string => typeof item === "string",
  );
}

function readList(fields: FieldExtractionResult, name: string): ReadonlyArray<unknown> {
  const value = fields.fields[name]?.value;
  return Array.isArray(value) ? value : [];
}

// Dated roles sorted newest start first; undated roles keep document order after them.
function recentFirst(entries: ReadonlyArray<ExperienceEntry>): DatedEntry[] {
  const withRange: Array<{ entry: ExperienceEntry; range: DateRange }> = [];
  const withoutRange: DatedEntry[] = [];
  for (const entry of entries) {
    const range = entry.dates ? parseDateRange(entry.dates) : null;
    if (range) {
      withRange.push({ entry, range });
    } else {
      withoutRange.push({ entry, range: null });
    }
  }
  withRange.sort((left, right) => compareIsoDates(right.range.start, left.range.start));
  return [...withRange, ...withoutRange];
}

function latestExplicitDate(
  experience: ReadonlyArray<DatedEntry>,
  education: ReadonlyArray<EducationEntry>,
): string | null {
  const candidates: string[] = [];
  for (const { range } of experience) {
    if (range) {
      candidates.push(range.start);
      if (range.end) {
        candidates.push(range.end);
      }
    }
  }
  for (const entry of education) {
    const range = entry.dates ? parseDateRange(entry.dates) : null;
    if (range) {
      candidates.push(range.start);
      if (range.end) {
        candidates.push(range.end);
      }
    }
  }
  if (candidates.length === 0) {
    return null;
  }
  return candidates.reduce((latest, value) => (compareIsoDates(value, latest) > 0 ? value : latest));
}
