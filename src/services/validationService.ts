import { z } from "zod";
import { JOKE_LENGTHS, JOKE_STYLES } from "../models/session.js";

export const MAX_MESSAGE_LENGTH = 4000;

export function normalize(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

// -------------------- Validación de texto libre --------------------
export function isValidMessage(msg: string): boolean {
  const trimmed = normalize(msg);
  return trimmed.length > 0 && trimmed.length <= MAX_MESSAGE_LENGTH;
}

// -------------------- Esquemas de los cuerpos --------------------
const sessionIdSchema = z.string().trim().min(1, "sessionId is required");

export const sessionRequestSchema = z.object({
  sessionId: sessionIdSchema,
});

export const chatRequestSchema = z.object({
  sessionId: sessionIdSchema,
  message: z.string({ required_error: "message is required" }).refine(isValidMessage, {
    message: `message must contain text (max ${MAX_MESSAGE_LENGTH} characters)`,
  }),
});

export const preferencesPatchSchema = z
  .object({
    style: z.enum(JOKE_STYLES),
    topic: z.string().trim().max(200),
    length: z.enum(JOKE_LENGTHS),
    temperature: z.number().min(0).max(1),
    // "" borra la clave propia y vuelve a la del entorno
    apiKey: z.string().trim(),
  })
  .partial()
  .strict();

export type PreferencesPatch = z.infer<typeof preferencesPatchSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
