/**
 * Gemini TTS engine.
 *
 * Gemini speaks with prebuilt voices only, so the voice reference is read as a
 * voice name; paths to reference recordings fall back to the configured voice.
 * Audio comes back as raw PCM (L16), 16-bit mono, 24 kHz unless the mime type
 * says otherwise.
 */

import type { GoogleGenAI } from "@google/genai";
import { geminiLogger } from "../../logger";
import { getGeminiClient } from "../../ai/geminiClient";
import { pcm16ToFloat32 } from "../../audio/wavCodec";
import type { SynthesisParams, SynthesizedAudio, TtsEngine } from "../ttsEngine";

/**
 * Available Gemini TTS voices
 */
export const TTS_VOICES = {
  KORE: "Kore",      // Warm, friendly female voice
  CHARON: "Charon",  // Deep, authoritative male voice
  PUCK: "Puck",      // Energetic, youthful voice
  FENRIR: "Fenrir",  // Strong, dramatic voice
  AOEDE: "Aoede",    // Calm, soothing female voice
  LEDA: "Leda",      // Professional, clear female voice
  ORUS: "Orus",      // Balanced, neutral male voice
  ZEPHYR: "Zephyr",  // Light, airy voice
} as const;

const GEMINI_PCM_RATE = 24000;

const KNOWN_VOICES: readonly string[] = Object.values(TTS_VOICES);

export interface GeminiTtsOptions {
  model: string;
  defaultVoice: string;
  client?: GoogleGenAI;
}

export function resolveVoiceName(voiceRef: string, defaultVoice: string): string {
  const candidate = voiceRef.trim();
  const match = KNOWN_VOICES.find(voice => voice.toLowerCase() === candidate.toLowerCase());
  return match ?? defaultVoice;
}

/** Sample rate from a mime type such as "audio/L16;codec=pcm;rate=24000". */
export function sampleRateFromMime(mimeType: string | undefined): number {
  const match = mimeType?.match(/rate=(\d+)/);
  return match ? Number(match[1]) : GEMINI_PCM_RATE;
}

export class GeminiTtsEngine implements TtsEngine {
  readonly name = "gemini";

  constructor(private readonly options: GeminiTtsOptions) {}

  async synthesize(text: string, voiceRef: string, params: SynthesisParams): Promise<SynthesizedAudio> {
    const client = this.options.client ?? getGeminiClient();
    const voiceName = resolveVoiceName(voiceRef, this.options.defaultVoice);

    const response = await client.models.generateContent({
      model: this.options.model,
      contents: [
        {
          role: "user",
          parts: [{ text }],
        },
      ],
      config: {
        responseModalities: ["AUDIO"],
        speechConfig: {
          languageCode: params.language,
          voiceConfig: {
            prebuiltVoiceConfig: {
              voiceName,
            },
          },
        },
      },
    });

    const audioData = response.candidates?.[0]?.content?.parts?.[0]?.inlineData;
    if (!audioData?.data) {
      throw new Error("No audio data in Gemini TTS response");
    }

    const pcm = new Uint8Array(Buffer.from(audioData.data, "base64"));
    const sampleRate = sampleRateFromMime(audioData.mimeType);
    geminiLogger.debug(`Received ${pcm.length} bytes of PCM at ${sampleRate}Hz (voice ${voiceName})`);

    return { samples: pcm16ToFloat32(pcm), sampleRate };
  }
}
