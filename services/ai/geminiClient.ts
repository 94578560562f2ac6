import { GoogleGenAI } from "@google/genai";
import { geminiLogger } from "../logger";

/**
 * Initialize GoogleGenAI with hybrid authentication:
 * - Vertex AI ADC when GOOGLE_CLOUD_PROJECT is set
 * - otherwise GEMINI_API_KEY
 */
export function createGeminiClient(env: NodeJS.ProcessEnv = process.env): GoogleGenAI {
  const vertexProject = env.GOOGLE_CLOUD_PROJECT || "";
  const vertexLocation = env.GOOGLE_CLOUD_LOCATION || "global";
  const geminiKey = env.GEMINI_API_KEY || "";

  if (vertexProject) {
    geminiLogger.info(`Using Vertex AI with project: ${vertexProject}`);
    return new GoogleGenAI({
      vertexai: true,
      project: vertexProject,
      location: vertexLocation,
    });
  }

  if (geminiKey) {
    geminiLogger.info("Using API key auth (Vertex AI not configured)");
    return new GoogleGenAI({ apiKey: geminiKey });
  }

  throw new Error(
    "No Gemini authentication configured. Set either:\n" +
    "- GOOGLE_CLOUD_PROJECT for Vertex AI\n" +
    "- GEMINI_API_KEY for API key auth"
  );
}

export function hasGeminiCredentials(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.GOOGLE_CLOUD_PROJECT || env.GEMINI_API_KEY);
}

// Lazy initialization - create client on first access
let sharedClient: GoogleGenAI | null = null;

export function getGeminiClient(): GoogleGenAI {
  if (!sharedClient) {
    sharedClient = createGeminiClient();
  }
  return sharedClient;
}
