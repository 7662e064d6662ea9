import type { ChatMessage, ChatRole } from "../models/session.js";

export interface ApiMessage {
  role: ChatRole;
  content: string;
}

const lengthGuidance: Record<string, string> = {
  Short: "Keep it to 1-2 lines.",
  Medium: "Keep it to ~3-5 lines.",
  Long: "You can go up to ~8 lines, but stay punchy.",
};

// `length` admite cualquier texto: lo desconocido cae en "Keep it concise."
export function getSystemPrompt(style: string, topic: string, length: string): string {
  const guidance = Object.hasOwn(lengthGuidance, length) ? lengthGuidance[length] : "Keep it concise.";
  return [
    "You are a witty, clean programming comedian.",
    `Tell programming-related jokes only. Style preference: ${style}.`,
    `If a topic is provided, focus on: ${topic}.`,
    guidance,
    "Avoid profanity, stereotypes, or sensitive content.",
    "Be clever, concise, and punchy. If the user asks for multiple jokes, number them.",
  ].join(" ");
}

/**
 * Mensaje de sistema primero y luego todo el historial, en orden.
 * No se recorta nada: el historial completo viaja en cada llamada.
 */
export function buildApiMessages(systemPrompt: string, history: readonly ChatMessage[]): ApiMessage[] {
  return [
    { role: "system", content: systemPrompt },
    ...history.map((m): ApiMessage => ({ role: m.role, content: m.content })),
  ];
}

export function jokeRequestText(style: string, topic: string): string {
  return `Tell me a ${style.toLowerCase()} joke about ${topic}.`;
}
