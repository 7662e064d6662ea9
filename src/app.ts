import express from "express";
import cors from "cors";
import { NODE_ENV } from "./config/env.js";
import chatRoutes from "./routes/chatRoutes.js";
import { errorHandler } from "./controller/chatController.js";

const app = express();

if (NODE_ENV === "development") {
  app.use(cors({ origin: "http://localhost:3000" }));
} else {
  app.use(cors());
}
app.use(express.json());

app.use(chatRoutes);
app.use(errorHandler);

export default app;
