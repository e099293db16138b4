import express, { Request, Response } from "express";
import cors from "cors";
import multer from "multer";
import fs from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { env } from "../config/env";
import type { JobService } from "../services/jobService";
import { RESOLUTION_LABELS } from "../types/models";
import { ValidationError } from "../utils/errors";
import { sanitizeFilename, storagePaths } from "../utils/storage";
import { isSupportedSubtitle, SUBTITLE_EXTENSIONS } from "../utils/subtitles";
import { parseListField, submitBodySchema, uploadFieldsSchema } from "../utils/validators";

export interface AppDependencies {
  jobService: Pick<JobService, "submit" | "getStatus" | "cancel" | "listAll" | "getOutput" | "counts">;
  uploadDir?: string;
}

const UNSUPPORTED_SUBTITLE = `Unsupported subtitle format. Allowed: ${SUBTITLE_EXTENSIONS.join(", ")}`;

const resolutionParam = z.enum(RESOLUTION_LABELS);

const createUpload = (uploadDir: string): multer.Multer =>
  multer({
    storage: multer.diskStorage({
      destination: (_req, _file, cb) => {
        fs.mkdir(uploadDir, { recursive: true }, (error) => cb(error, uploadDir));
      },
      filename: (_req, file, cb) => {
        cb(null, `${uuidv4()}_${sanitizeFilename(file.originalname)}`);
      },
    }),
    limits: {
      fileSize: env.maxUploadSizeMb * 1024 * 1024,
    },
    fileFilter: (_req, file, cb) => {
      if (!isSupportedSubtitle(file.originalname)) {
        cb(new Error(UNSUPPORTED_SUBTITLE));
        return;
      }
      cb(null, true);
    },
  });

const toClientError = (error: unknown): { statusCode: number; body: Record<string, unknown> } => {
  if (error instanceof ValidationError) {
    return {
      statusCode: 400,
      body: { message: error.message, issues: error.issues },
    };
  }
  if (error instanceof multer.MulterError && error.code === "LIMIT_FILE_SIZE") {
    return {
      statusCode: 400,
      body: { message: `File too large. Max allowed is ${env.maxUploadSizeMb}MB` },
    };
  }
  if (error instanceof Error && error.message.startsWith("Unsupported subtitle format")) {
    return {
      statusCode: 400,
      body: { message: error.message },
    };
  }
  return {
    statusCode: 500,
    body: { message: "Internal server error" },
  };
};

export const createApp = ({ jobService, uploadDir = storagePaths.uploads }: AppDependencies): express.Express => {
  const app = express();
  const upload = createUpload(uploadDir);

  app.use(cors({ origin: env.frontendOrigin }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    const counts = jobService.counts();
    res.json({
      ok: true,
      activeJobs: counts.active,
      completedJobs: counts.completed,
    });
  });

  app.post("/api/jobs", (req: Request, res: Response) => {
    const parsed = submitBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid job request", issues: parsed.error.issues });
      return;
    }

    try {
      const jobId = jobService.submit({
        videoUrl: parsed.data.videoUrl,
        subtitle: { kind: "url", url: parsed.data.subtitleUrl },
        resolutions: parsed.data.resolutions,
        softSubtitle: parsed.data.softSubtitle,
      });
      res.status(202).json({ jobId });
    } catch (error) {
      const clientError = toClientError(error);
      if (clientError.statusCode === 500) {
        console.error(error);
      }
      res.status(clientError.statusCode).json(clientError.body);
    }
  });

  app.post("/api/jobs/upload", upload.single("subtitleFile"), (req: Request, res: Response) => {
    if (!req.file) {
      res.status(400).json({ message: "subtitleFile is required" });
      return;
    }

    const fields = uploadFieldsSchema.safeParse(req.body);
    if (!fields.success) {
      res.status(400).json({ message: "Invalid job request", issues: fields.error.issues });
      return;
    }

    try {
      const jobId = jobService.submit({
        videoUrl: fields.data.videoUrl,
        subtitle: { kind: "file", path: req.file.path },
        resolutions: parseListField(fields.data.resolutions),
        softSubtitle: fields.data.softSubtitle,
      });
      res.status(202).json({ jobId });
    } catch (error) {
      const clientError = toClientError(error);
      if (clientError.statusCode === 500) {
        console.error(error);
      }
      res.status(clientError.statusCode).json(clientError.body);
    }
  });

  app.get("/api/jobs", (_req, res) => {
    res.json({ jobs: jobService.listAll() });
  });

  app.get("/api/jobs/:jobId", (req: Request, res: Response) => {
    const job = jobService.getStatus(req.params.jobId);
    if (!job) {
      res.status(404).json({ message: "Job not found" });
      return;
    }
    res.json(job);
  });

  app.post("/api/jobs/:jobId/cancel", (req: Request, res: Response) => {
    const outcome = jobService.cancel(req.params.jobId);
    if (outcome === "not_found") {
      res.status(404).json({ message: "Job not found" });
      return;
    }
    res.json({ jobId: req.params.jobId, message: "Cancellation requested" });
  });

  app.get("/api/jobs/:jobId/outputs/:resolution", (req: Request, res: Response) => {
    const resolution = resolutionParam.safeParse(req.params.resolution);
    if (!resolution.success) {
      res.status(400).json({ message: `Unknown resolution: ${req.params.resolution}` });
      return;
    }

    const job = jobService.getStatus(req.params.jobId);
    if (!job) {
      res.status(404).json({ message: "Job not found" });
      return;
    }

    const outputPath = jobService.getOutput(job.id, resolution.data);
    if (!outputPath) {
      res.status(404).json({ message: "Output video not ready" });
      return;
    }

    res.download(outputPath, path.basename(outputPath), (error) => {
      if (error && !res.headersSent) {
        console.error(`[backend] failed to send ${outputPath}`, error);
        res.status(404).json({ message: "Output file missing" });
      }
    });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: express.NextFunction) => {
    const clientError = toClientError(error);
    if (clientError.statusCode === 500) {
      console.error(error);
    }
    res.status(clientError.statusCode).json(clientError.body);
  });

  return app;
};
