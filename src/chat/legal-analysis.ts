// src/chat/legal-analysis.ts

export interface LegalSection {
  sectionName: string;
  citation: string;
  relevance: string;
}

export interface LegalAnalysis {
  applicableLaws: LegalSection[];
  legalProcedure: string[];
  strategicAdvice: string[];
  legalLoopholes: string[];
  keyRisks: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter(Boolean);
}

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function sections(value: unknown): LegalSection[] {
  if (!Array.isArray(value)) return [];
  const out: LegalSection[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const sectionName = text(item.section_name);
    if (!sectionName) continue;
    out.push({ sectionName, citation: text(item.citation), relevance: text(item.relevance) });
  }
  return out;
}

/**
 * Reads the structured answer the model was asked for. Tolerates a fenced
 * ```json block; anything without at least one populated field is `null`.
 */
export function parseLegalAnalysis(raw: string): LegalAnalysis | null {
  const body = raw
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const analysis: LegalAnalysis = {
    applicableLaws: sections(parsed.applicable_laws),
    legalProcedure: stringList(parsed.legal_procedure),
    strategicAdvice: stringList(parsed.strategic_advice),
    legalLoopholes: stringList(parsed.legal_loopholes),
    keyRisks: stringList(parsed.key_risks),
  };

  const populated =
    analysis.applicableLaws.length +
    analysis.legalProcedure.length +
    analysis.strategicAdvice.length +
    analysis.legalLoopholes.length +
    analysis.keyRisks.length;

  return populated > 0 ? analysis : null;
}

function bullets(title: string, items: string[]): string | null {
  if (items.length === 0) return null;
  return [`### ${title}`, ...items.map((item) => `- ${item}`)].join('\n');
}

export function renderLegalAnalysis(analysis: LegalAnalysis): string {
  const blocks: Array<string | null> = [];

  if (analysis.applicableLaws.length > 0) {
    const laws = analysis.applicableLaws.map((law) => {
      const lines = [`**${law.sectionName}**`];
      if (law.citation) lines.push(`- Citation: ${law.citation}`);
      if (law.relevance) lines.push(`- Relevance: ${law.relevance}`);
      return lines.join('\n');
    });
    blocks.push(['### Applicable Legal Sections', ...laws].join('\n'));
  }

  if (analysis.legalProcedure.length > 0) {
    blocks.push(
      [
        '### Legal Procedure',
        ...analysis.legalProcedure.map((step, i) => `${i + 1}. ${step}`),
      ].join('\n'),
    );
  }

  blocks.push(bullets('Strategic Recommendations', analysis.strategicAdvice));
  blocks.push(bullets('Legal Loopholes & Opportunities', analysis.legalLoopholes));
  blocks.push(bullets('Key Legal Risks', analysis.keyRisks));

  return blocks.filter((block): block is string => block !== null).join('\n\n');
}

/** Markdown for a structured answer, or the raw text under an "Analysis" label. */
export function formatStructuredAnswer(raw: string): string {
  const analysis = parseLegalAnalysis(raw);
  return analysis ? renderLegalAnalysis(analysis) : `**Analysis:** ${raw.trim()}`;
}
