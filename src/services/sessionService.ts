import logger from "../utils/logger.js";
import { SessionBusyError } from "../models/errors.js";
import type { ChatMessage, GenerationPreferences, Session } from "../models/session.js";
import type { CompletionClient } from "./aiServices.js";
import { buildApiMessages, getSystemPrompt, jokeRequestText } from "./promptService.js";
import type { PreferencesPatch } from "./validationService.js";

export const GREETING =
  "Hello! I'm your programming joke bot. Ask me for a joke about any language, framework, or bug!";
export const NEW_CHAT_GREETING = "New chat started! What topic should the next joke be about?";

export const DEFAULT_PREFERENCES: Readonly<GenerationPreferences> = {
  style: "One-liner",
  topic: "Python",
  length: "Short",
  temperature: 0.8,
};

export interface TurnOptions {
  model: string;
  maxTokens?: number;
}

export type TurnResult = { ok: true; reply: string } | { ok: false; error: string };

function message(role: ChatMessage["role"], content: string): ChatMessage {
  return { role, content, timestamp: Date.now() };
}

export function createSession(now: number = Date.now()): Session {
  return {
    messages: [message("assistant", GREETING)],
    preferences: { ...DEFAULT_PREFERENCES },
    pending: false,
    lastActive: now,
  };
}

async function runTurn(
  session: Session,
  userText: string,
  client: CompletionClient,
  { model, maxTokens }: TurnOptions
): Promise<TurnResult> {
  if (session.pending) throw new SessionBusyError();

  session.messages.push(message("user", userText));
  session.lastActive = Date.now();

  const { style, topic, length, temperature } = session.preferences;
  const systemPrompt = getSystemPrompt(style, topic, length);
  const apiMessages = buildApiMessages(systemPrompt, session.messages);

  session.pending = true;
  try {
    const reply = await client.complete({ model, messages: apiMessages, temperature, maxTokens });
    session.messages.push(message("assistant", reply));
    return { ok: true, reply };
  } catch (err) {
    // el mensaje del usuario se queda; no se agrega respuesta
    const description = err instanceof Error ? err.message : String(err);
    logger.error(`❌ Falló la llamada al modelo: ${description}`);
    return { ok: false, error: `Error: ${description}` };
  } finally {
    session.pending = false;
    session.lastActive = Date.now();
  }
}

// Botón "Tell me a joke now"
export function tellJoke(session: Session, client: CompletionClient, options: TurnOptions): Promise<TurnResult> {
  const { style, topic } = session.preferences;
  return runTurn(session, jokeRequestText(style, topic), client, options);
}

export function sendMessage(
  session: Session,
  text: string,
  client: CompletionClient,
  options: TurnOptions
): Promise<TurnResult> {
  return runTurn(session, text, client, options);
}

export function resetConversation(session: Session): Session {
  if (session.pending) throw new SessionBusyError();
  session.messages = [message("assistant", NEW_CHAT_GREETING)];
  session.lastActive = Date.now();
  return session;
}

export function updatePreferences(session: Session, patch: PreferencesPatch): Session {
  const { apiKey, ...preferences } = patch;
  session.preferences = { ...session.preferences, ...preferences };
  if (apiKey !== undefined) {
    if (apiKey) session.apiKey = apiKey;
    else delete session.apiKey;
  }
  session.lastActive = Date.now();
  return session;
}
