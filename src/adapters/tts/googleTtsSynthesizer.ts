import fs from 'node:fs/promises';
import type { SpeechSynthesisPort } from '@/ports/SpeechSynthesisPort';
import { createLogger } from '@/shared/logging/logger';

/** The translate endpoint rejects longer `q` values. */
export const MAX_CHUNK_CHARS = 200;

const TTS_ENDPOINT = 'https://translate.google.com/translate_tts';
const DEFAULT_TIMEOUT_MS = 15000;

const THREE_LETTER_CODES: Record<string, string> = {
  nld: 'nl',
  dut: 'nl',
  eng: 'en',
  deu: 'de',
  ger: 'de',
  fra: 'fr',
  fre: 'fr',
  spa: 'es',
  ita: 'it',
  por: 'pt',
};

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export function normalizeLanguage(language?: string): string {
  const lower = (language ?? '').trim().toLowerCase();
  if (!lower) {
    return 'en';
  }
  return THREE_LETTER_CODES[lower] ?? lower;
}

/**
 * Splits text into chunks of at most `maxChars`, preferring sentence ends,
 * then word boundaries. A single word longer than `maxChars` is cut.
 */
export function splitText(text: string, maxChars: number = MAX_CHUNK_CHARS): string[] {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (!normalized) {
    return [];
  }
  const sentences = normalized.match(/[^.!?;:]+[.!?;:]*/g) ?? [normalized];
  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    if (current) {
      chunks.push(current);
      current = '';
    }
  };

  for (const sentence of sentences.map((part) => part.trim()).filter(Boolean)) {
    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length <= maxChars) {
      current = candidate;
      continue;
    }
    flush();
    for (const word of sentence.split(' ')) {
      const next = current ? `${current} ${word}` : word;
      if (next.length <= maxChars) {
        current = next;
        continue;
      }
      flush();
      let rest = word;
      while (rest.length > maxChars) {
        chunks.push(rest.slice(0, maxChars));
        rest = rest.slice(maxChars);
      }
      current = rest;
    }
  }
  flush();
  return chunks;
}

export function buildGoogleTtsUrl(chunk: string, lang: string, index: number, total: number): string {
  const url = new URL(TTS_ENDPOINT);
  url.searchParams.set('ie', 'UTF-8');
  url.searchParams.set('q', chunk);
  url.searchParams.set('tl', lang);
  url.searchParams.set('client', 'tw-ob');
  url.searchParams.set('ttsspeed', '1');
  url.searchParams.set('total', String(total));
  url.searchParams.set('idx', String(index));
  url.searchParams.set('textlen', String(chunk.length));
  return url.toString();
}

/**
 * Speech engine backed by the Google Translate TTS endpoint. Long texts are
 * fetched chunk by chunk and the MP3 payloads concatenated.
 */
export class GoogleTtsSynthesizer implements SpeechSynthesisPort {
  private readonly log = createLogger('Tts', 'Google');

  constructor(
    private readonly fetchImpl: FetchLike = fetch,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {}

  public async synthesize(text: string, language: string, outputPath: string): Promise<void> {
    const chunks = splitText(text);
    if (chunks.length === 0) {
      throw new Error('no text to synthesize');
    }
    const lang = normalizeLanguage(language);
    const parts: Buffer[] = [];
    for (const [index, chunk] of chunks.entries()) {
      parts.push(await this.fetchChunk(chunk, lang, index, chunks.length));
    }
    const audio = Buffer.concat(parts);
    await fs.writeFile(outputPath, audio);
    this.log.info('generated speech clip', { lang, chunks: chunks.length, bytes: audio.length });
  }

  private async fetchChunk(chunk: string, lang: string, index: number, total: number): Promise<Buffer> {
    // Covers the body read as well; a stalled engine must not hold the worker.
    const signal = AbortSignal.timeout(this.timeoutMs);
    try {
      const res = await this.fetchImpl(buildGoogleTtsUrl(chunk, lang, index, total), {
        headers: {
          'User-Agent':
            'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122 Safari/537.36',
          Accept: '*/*',
        },
        signal,
      });
      const contentType = res.headers.get('content-type') ?? '';
      if (!res.ok || !contentType.includes('audio')) {
        throw new Error(`HTTP ${res.status} ${res.statusText} (ct=${contentType || 'none'})`);
      }
      return Buffer.from(await res.arrayBuffer());
    } catch (error) {
      if (signal.aborted) {
        throw new Error(`speech request timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    }
  }
}
