export type ChatRole = "user" | "assistant" | "system";

export interface ChatMessage {
  role: ChatRole;
  content: string;
  timestamp: number;
}

export const JOKE_STYLES = ["One-liner", "Pun", "Dad joke", "Knock-knock", "Story"] as const;
export type JokeStyle = (typeof JOKE_STYLES)[number];

export const JOKE_LENGTHS = ["Short", "Medium", "Long"] as const;
export type JokeLength = (typeof JOKE_LENGTHS)[number];

export interface GenerationPreferences {
  style: JokeStyle;
  topic: string;
  length: JokeLength;
  /** Creatividad, de 0 a 1 */
  temperature: number;
}

export interface Session {
  messages: ChatMessage[];
  preferences: GenerationPreferences;
  /** Clave propia de la sesión; si falta se usa OPENAI_API_KEY */
  apiKey?: string;
  /** true mientras hay una llamada al modelo en curso */
  pending: boolean;
  lastActive: number;
}

export interface TextPart {
  type: "text" | "bold" | "break" | "listItem";
  content: string;
  ordered?: boolean;
}

// Clave: sessionId tal como lo envía el cliente
export const sessions = new Map<string, Session>();

// Elimina sesiones inactivas y devuelve los ids borrados
export function pruneExpiredSessions(now: number, ttlMs: number): string[] {
  const removed: string[] = [];
  for (const [id, session] of sessions) {
    if (session.pending) continue;
    if (now - session.lastActive > ttlMs) {
      sessions.delete(id);
      removed.push(id);
    }
  }
  return removed;
}
