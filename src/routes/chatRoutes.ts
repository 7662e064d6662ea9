import { Router } from "express";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import {
  chatHandler,
  createSessionHandler,
  getSessionHandler,
  jokeHandler,
  preferencesHandler,
  resetHandler,
} from "../controller/chatController.js";

// Express 4 no captura promesas rechazadas
const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

const router = Router();
router.post("/session", createSessionHandler);
router.get("/session/:sessionId", getSessionHandler);
router.patch("/session/:sessionId/preferences", preferencesHandler);
router.post("/joke", asyncRoute(jokeHandler));
router.post("/chat", asyncRoute(chatHandler));
router.post("/reset", resetHandler);

export default router;
