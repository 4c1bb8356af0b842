import { findLexiconTerms, type AuthenticityLexicon } from "../extraction/lexicons";
import type { DocumentMetadata } from "../shared/types/document.types";
import type { AuthenticityReport } from "../shared/types/validation.types";
import { clampScore } from "../shared/utils/scoring.util";

const SIGNING_TOOL_POINTS = 20;
const CREATION_METADATA_POINTS = 10;
const POINTS_PER_KEYWORD = 2;
const RECOGNIZED_INSTITUTION_POINTS = 10;

export interface AuthenticityInput {
  text: string;
  documentHash: string;
  metadata: DocumentMetadata | null;
}

// Text and file-metadata signals only; nothing here contacts an issuer.
export function assessCertificateAuthenticity(
  input: AuthenticityInput,
  lexicon: AuthenticityLexicon,
): AuthenticityReport {
  const indicators: string[] = [];
  const riskFactors: string[] = [];
  let score = 0;

  const producer = (input.metadata?.producer ?? "").toLowerCase();
  const creator = (input.metadata?.creator ?? "").toLowerCase();
  const signingTools = lexicon.signingTools.filter((tool) => producer.includes(tool) || creator.includes(tool));
  if (signingTools.length > 0) {
    indicators.push(...signingTools.map((tool) => `Signed with ${tool}`));
    score += SIGNING_TOOL_POINTS;
  } else {
    riskFactors.push("No digital verification method detected");
  }

  if (producer || creator) {
    indicators.push("Contains creation metadata");
    score += CREATION_METADATA_POINTS;
  } else {
    riskFactors.push("Missing creation metadata");
  }

  const keywords = findLexiconTerms(input.text, lexicon.verificationKeywords).map((keyword) => keyword.toLowerCase());
  if (keywords.length > 0) {
    indicators.push(`Contains verification keywords: ${keywords.join(", ")}`);
    score += keywords.length * POINTS_PER_KEYWORD;
  }

  const institutions = findLexiconTerms(input.text, lexicon.recognizedInstitutions).map((name) => name.toLowerCase());
  if (institutions.length > 0) {
    indicators.push(`Issued by a recognized institution type: ${institutions.join(", ")}`);
    score += RECOGNIZED_INSTITUTION_POINTS;
  } else {
    riskFactors.push("No recognized issuing institution named");
  }

  const authenticityScore = clampScore(score);
  return {
    document_hash: input.documentHash,
    verification_keywords: keywords,
    recognized_institutions: institutions,
    signing_tools: signingTools,
    metadata: input.metadata,
    authenticity_score: authenticityScore,
    indicators,
    risk_factors: riskFactors,
    recommendations: [recommendationFor(authenticityScore)],
  };
}

function recommendationFor(score: number): string {
  if (score >= 80) {
    return "High authenticity confidence: the certificate appears genuine";
  }
  if (score >= 60) {
    return "Moderate authenticity confidence: confirm through an additional channel";
  }
  if (score >= 40) {
    return "Low authenticity confidence: verify manually with the issuer";
  }
  return "Very low authenticity confidence: treat the certificate with caution";
}
