import { registerTtsEngine } from '../ttsEngine';
import { GeminiTtsEngine } from './geminiTtsEngine';
import { HttpTtsEngine } from './httpTtsEngine';

export { GeminiTtsEngine, TTS_VOICES } from './geminiTtsEngine';
export { HttpTtsEngine } from './httpTtsEngine';

/** Register the engines that ship with the project. Safe to call repeatedly. */
export function registerBuiltinEngines(): void {
  registerTtsEngine('gemini', config => new GeminiTtsEngine({
    model: config.engines.gemini.model,
    defaultVoice: config.engines.gemini.voice,
  }));
  registerTtsEngine('http', config => new HttpTtsEngine({
    baseUrl: config.engines.http.baseUrl,
    timeoutMs: config.engines.http.timeoutMs,
    maxConcurrency: config.engines.http.maxConcurrency,
  }));
}
