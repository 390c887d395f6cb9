export type SummaryContentType = 'PDF' | 'HTML' | 'TEXT';

export type SummaryResult =
  | {
      ok: true;
      url: string | null;
      summary: string;
      context: string;
      contentType: SummaryContentType;
    }
  | { ok: false; url: string | null; error: string };
