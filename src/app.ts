import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerRoutes } from "./api/routes.js";
import { loadConfig, type AppConfig } from "./config.js";

export const buildApp = async (config: AppConfig = loadConfig()): Promise<FastifyInstance> => {
  const app = Fastify({ logger: { level: config.logLevel } });

  await app.register(cors, {
    origin: config.corsOrigins,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
    maxAge: 86400,
  });

  registerRoutes(app, config.apiPrefix);

  return app;
};
