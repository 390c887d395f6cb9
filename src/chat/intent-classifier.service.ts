// src/chat/intent-classifier.service.ts
import { Injectable } from '@nestjs/common';
import { Intent } from './chat.types';

const GREETING_PATTERN =
  /^(hi|hello|hey|hiya|greetings|good\s+(morning|afternoon|evening|day)|thanks|thank\s+you|how\s+are\s+you|what'?s\s+up|who\s+are\s+you|bye|goodbye|ok(ay)?)\b/i;

const LEGAL_TERMS: ReadonlySet<string> = new Set([
  'law',
  'laws',
  'legal',
  'section',
  'sections',
  'act',
  'statute',
  'ipc',
  'crpc',
  'cpc',
  'bns',
  'constitution',
  'article',
  'court',
  'judge',
  'judgment',
  'judgement',
  'case',
  'cases',
  'summarize',
  'summarise',
  'bail',
  'fir',
  'police',
  'arrest',
  'accused',
  'victim',
  'offence',
  'offense',
  'crime',
  'criminal',
  'punishment',
  'penalty',
  'lawyer',
  'advocate',
  'petition',
  'appeal',
  'contract',
  'property',
  'divorce',
  'custody',
  'rights',
  'complaint',
  'prosecution',
  'defense',
  'defence',
]);

const CASUAL_MAX_WORDS = 10;

/**
 * Keyword router. Only greetings and small talk without a legal signal go
 * straight to the model; everything else goes to retrieval.
 */
@Injectable()
export class IntentClassifierService {
  classify(message: string): Intent {
    const lowered = (message ?? '').trim().toLowerCase();
    if (!lowered) return 'casual';

    if (this.isCasual(lowered)) return 'casual';

    const mentionsCase = /\bcases?\b/.test(lowered);
    const mentionsSummary = /\bsummari[sz]e/.test(lowered);

    if (mentionsCase && mentionsSummary) return 'summarize_case';
    if (mentionsCase || /\bjudge?ments?\b/.test(lowered)) return 'search_case';
    if (mentionsSummary) return 'summarize';
    return 'general';
  }

  isLegal(message: string): boolean {
    const lowered = (message ?? '').trim().toLowerCase();
    return this.hasLegalTerm(lowered) || this.wordCount(lowered) > CASUAL_MAX_WORDS;
  }

  private isCasual(lowered: string): boolean {
    return GREETING_PATTERN.test(lowered) && !this.isLegal(lowered);
  }

  private hasLegalTerm(lowered: string): boolean {
    const tokens = lowered.match(/[a-z0-9]+/g) ?? [];
    return tokens.some((token) => LEGAL_TERMS.has(token));
  }

  private wordCount(lowered: string): number {
    return lowered.split(/\s+/).filter(Boolean).length;
  }
}
