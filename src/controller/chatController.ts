import type { NextFunction, Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { config } from "../config/env.js";
import logger from "../utils/logger.js";
import { parseMessageParts } from "../utils/formattext.js";
import { sessions } from "../models/session.js";
import type { Session } from "../models/session.js";
import { SessionBusyError, SessionNotFoundError } from "../models/errors.js";
import { createCompletionClient } from "../services/aiServices.js";
import {
  createSession,
  resetConversation,
  sendMessage,
  tellJoke,
  updatePreferences,
} from "../services/sessionService.js";
import type { TurnResult } from "../services/sessionService.js";
import {
  chatRequestSchema,
  describeIssues,
  preferencesPatchSchema,
  sessionRequestSchema,
} from "../services/validationService.js";

// Vista de la sesión para el cliente; la clave nunca sale
function sessionView(sessionId: string, session: Session) {
  return {
    sessionId,
    messages: session.messages.map((m) => ({ ...m, parts: parseMessageParts(m.content) })),
    preferences: session.preferences,
    hasApiKey: Boolean(session.apiKey ?? config.OPENAI_API_KEY),
    pending: session.pending,
  };
}

function getOrCreateSession(sessionId: string): Session {
  let session = sessions.get(sessionId);
  if (!session) {
    session = createSession();
    sessions.set(sessionId, session);
    logger.info(`🆕 Sesión ${sessionId} creada`);
  }
  return session;
}

function requireSession(sessionId: string): Session {
  const session = sessions.get(sessionId);
  if (!session) throw new SessionNotFoundError(sessionId);
  return session;
}

function clientFor(session: Session) {
  return createCompletionClient({
    apiUrl: config.LLM_API_URL,
    apiKey: session.apiKey ?? config.OPENAI_API_KEY,
    timeoutMs: config.LLM_TIMEOUT_MS,
  });
}

const turnOptions = () => ({ model: config.LLM_MODEL, maxTokens: config.LLM_MAX_TOKENS });

function sendTurn(res: Response, sessionId: string, session: Session, result: TurnResult) {
  const { messages } = sessionView(sessionId, session);
  if (!result.ok) return res.status(502).json({ error: result.error, messages });
  return res.json({ response: result.reply, messages });
}

export function createSessionHandler(_req: Request, res: Response) {
  const sessionId = uuidv4();
  const session = getOrCreateSession(sessionId);
  return res.status(201).json(sessionView(sessionId, session));
}

export function getSessionHandler(req: Request, res: Response) {
  const { sessionId } = req.params;
  return res.json(sessionView(sessionId, requireSession(sessionId)));
}

export function preferencesHandler(req: Request, res: Response) {
  const { sessionId } = req.params;
  const session = requireSession(sessionId);

  const parsed = preferencesPatchSchema.safeParse(req.body);
  if (!parsed.success) return res.status(400).json({ error: describeIssues(parsed.error) });

  updatePreferences(session, parsed.data);
  return res.json(sessionView(sessionId, session));
}

export async function jokeHandler(req: Request, res: Response) {
  const parsed = sessionRequestSchema.safeParse(req.body);
  if (!parsed.success) return res.status(400).json({ error: describeIssues(parsed.error) });

  const { sessionId } = parsed.data;
  const session = getOrCreateSession(sessionId);
  const result = await tellJoke(session, clientFor(session), turnOptions());
  return sendTurn(res, sessionId, session, result);
}

export async function chatHandler(req: Request, res: Response) {
  const parsed = chatRequestSchema.safeParse(req.body);
  if (!parsed.success) return res.status(400).json({ error: describeIssues(parsed.error) });

  const { sessionId, message } = parsed.data;
  const session = getOrCreateSession(sessionId);
  const result = await sendMessage(session, message, clientFor(session), turnOptions());
  return sendTurn(res, sessionId, session, result);
}

export function resetHandler(req: Request, res: Response) {
  const parsed = sessionRequestSchema.safeParse(req.body);
  if (!parsed.success) return res.status(400).json({ error: describeIssues(parsed.error) });

  const { sessionId } = parsed.data;
  const session = resetConversation(getOrCreateSession(sessionId));
  logger.info(`🔄 Sesión ${sessionId} reiniciada`);
  return res.json(sessionView(sessionId, session));
}

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

// Middleware final de errores
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof SessionNotFoundError) return res.status(404).json({ error: err.message });
  if (err instanceof SessionBusyError) return res.status(409).json({ error: err.message });
  // JSON mal formado en el cuerpo (express.json)
  if (err instanceof SyntaxError) return res.status(400).json({ error: "Malformed JSON body" });
  // Resto de errores 4xx de express.json (p. ej. entity.too.large -> 413)
  const status = clientErrorStatus(err);
  if (status !== undefined) {
    return res.status(status).json({ error: err instanceof Error ? err.message : "Bad request" });
  }

  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  return res.status(500).json({ error: "Internal server error" });
}
