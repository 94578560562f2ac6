/**
 * Client for a self-hosted voice-cloning inference server.
 *
 * POST {baseUrl}/tts with JSON
 *   { text, reference_audio (base64 WAV), prompt_text?, language? }
 * and expects a WAV body back.
 */

import fs from 'fs';
import { synthesisLogger } from '../../logger';
import { decodeWav } from '../../audio/wavCodec';
import type { SynthesisParams, SynthesizedAudio, TtsEngine } from '../ttsEngine';

export interface HttpTtsOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Most self-hosted servers run one model instance and serialize requests */
  maxConcurrency: number;
}

export class HttpTtsEngine implements TtsEngine {
  readonly name = 'http';
  readonly maxConcurrency: number;
  private readonly referenceCache = new Map<string, Promise<string>>();

  constructor(private readonly options: HttpTtsOptions) {
    this.maxConcurrency = options.maxConcurrency;
  }

  async synthesize(text: string, voiceRef: string, params: SynthesisParams): Promise<SynthesizedAudio> {
    const referenceAudio = await this.loadReference(voiceRef);
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/tts`;

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        text,
        reference_audio: referenceAudio,
        prompt_text: params.promptText,
        language: params.language,
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new Error(`TTS server returned ${response.status}: ${detail.slice(0, 200)}`);
    }

    const decoded = decodeWav(new Uint8Array(await response.arrayBuffer()));
    return { samples: decoded.samples, sampleRate: decoded.sampleRate };
  }

  async cleanup(): Promise<void> {
    this.referenceCache.clear();
  }

  private loadReference(voiceRef: string): Promise<string> {
    const cached = this.referenceCache.get(voiceRef);
    if (cached) return cached;

    const loading = fs.promises.readFile(voiceRef).then(bytes => {
      synthesisLogger.debug(`Loaded reference audio ${voiceRef} (${bytes.length} bytes)`);
      return bytes.toString('base64');
    });
    this.referenceCache.set(voiceRef, loading);
    void loading.catch(() => this.referenceCache.delete(voiceRef));
    return loading;
  }
}
