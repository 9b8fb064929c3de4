import express, { Application, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";

// Local Imports
import routes from "./routes/index.js";

const app: Application = express();

const isProduction = process.env.NODE_ENV === "production";

app.use(cors({ methods: ["GET", "OPTIONS"] }));

// Security headers
app.use(
  helmet({
    contentSecurityPolicy: isProduction ? undefined : false,
  }),
);

// Compression
app.use(compression());

// Parse JSON request body
app.use(express.json());

app.use("/api", routes);

app.get("/", (_req: Request, res: Response) => {
  res.json({
    message: "13F holdings delta API",
  });
});

export default app;
