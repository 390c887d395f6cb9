export type ContentType = 'PDF' | 'HTML';

export type FetchedContent =
  | { ok: true; url: string; text: string; contentType: ContentType }
  | { ok: false; url: string; error: string };
