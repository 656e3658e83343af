import type { Express, Request, Response } from "express";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import {
  testContentSchema,
  saveDraftRequestSchema,
  startAttemptRequestSchema,
  initAttemptVersionRequestSchema,
  saveAnswersRequestSchema,
  upsertAnswersRequestSchema,
  completeAttemptRequestSchema,
  saveSnapshotRequestSchema,
} from "@shared/schema";
import { AppError, NotFoundError, ValidationError } from "./errors";
import type { Services } from "./services";

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(fromZodError(parsed.error).message);
  }
  return parsed.data;
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function sendError(res: Response, error: unknown, fallback: string) {
  if (error instanceof AppError) {
    return res.status(error.status).json({ error: error.message, code: error.code, ...error.details() });
  }
  console.error(`${fallback}:`, error);
  return res.status(500).json({ error: fallback, code: "INTERNAL_ERROR" });
}

export function registerRoutes(app: Express, services: Services): void {
  const { catalog, drafts, snapshots, attempts, answers, snapshotStorage, reports } = services;

  // ============================================
  // Tests
  // ============================================

  app.get("/api/tests", async (req, res) => {
    try {
      res.json(await catalog.listTests(queryString(req, "courseId")));
    } catch (error) {
      sendError(res, error, "Failed to fetch tests");
    }
  });

  app.post("/api/tests", async (req, res) => {
    try {
      const content = parseBody(testContentSchema, req.body);
      res.status(201).json(await catalog.createTest(content));
    } catch (error) {
      sendError(res, error, "Failed to create test");
    }
  });

  app.get("/api/tests/:id", async (req, res) => {
    try {
      res.json(await catalog.getTest(req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch test");
    }
  });

  app.delete("/api/tests/:id", async (req, res) => {
    try {
      await catalog.deleteTest(req.params.id);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, "Failed to delete test");
    }
  });

  app.post("/api/tests/:id/draft", async (req, res) => {
    try {
      const { draft, created } = await drafts.createDraftFromTest(req.params.id);
      res.status(created ? 201 : 200).json(draft);
    } catch (error) {
      sendError(res, error, "Failed to create draft");
    }
  });

  // ============================================
  // Drafts
  // ============================================

  app.get("/api/drafts", async (req, res) => {
    try {
      res.json(await drafts.listDrafts(queryString(req, "courseId")));
    } catch (error) {
      sendError(res, error, "Failed to fetch drafts");
    }
  });

  app.post("/api/drafts", async (req, res) => {
    try {
      const request = parseBody(saveDraftRequestSchema, req.body);
      const { draft, created } = await drafts.saveDraft(request);
      res.status(created ? 201 : 200).json(draft);
    } catch (error) {
      sendError(res, error, "Failed to save draft");
    }
  });

  app.get("/api/drafts/:id", async (req, res) => {
    try {
      res.json(await drafts.getDraft(req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch draft");
    }
  });

  app.delete("/api/drafts/:id", async (req, res) => {
    try {
      await drafts.deleteDraft(req.params.id);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, "Failed to delete draft");
    }
  });

  app.post("/api/drafts/:id/publish", async (req, res) => {
    try {
      res.json(await drafts.publish(req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to publish draft");
    }
  });

  // ============================================
  // Attempts
  // ============================================

  app.post("/api/tests/:id/attempts", async (req, res) => {
    try {
      const { studentId } = parseBody(startAttemptRequestSchema, req.body);
      res.status(201).json(await attempts.startAttempt(studentId, req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to start attempt");
    }
  });

  app.get("/api/tests/:id/attempts", async (req, res) => {
    try {
      res.json(await attempts.listAttemptsByTest(req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch attempts");
    }
  });

  app.get("/api/attempts/:id", async (req, res) => {
    try {
      res.json(await reports.getAttemptDetail(req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch attempt");
    }
  });

  app.get("/api/attempts/:id/version", async (req, res) => {
    try {
      res.json(await snapshots.getAttemptVersion(req.params.id));
    } catch (error) {
      sendError(res, error, "Failed to fetch attempt version");
    }
  });

  app.post("/api/attempts/:id/version/init", async (req, res) => {
    try {
      const init = parseBody(initAttemptVersionRequestSchema, req.body);
      res.json(await snapshots.initAttemptVersionIfEmpty(req.params.id, init));
    } catch (error) {
      sendError(res, error, "Failed to initialize attempt version");
    }
  });

  app.post("/api/attempts/:id/answers", async (req, res) => {
    try {
      const input = parseBody(saveAnswersRequestSchema, req.body);
      const status = await answers.saveAnswers(req.params.id, input);
      res.json({ status });
    } catch (error) {
      sendError(res, error, "Failed to save answers");
    }
  });

  app.put("/api/attempts/:id/answers/:questionId", async (req, res) => {
    try {
      const input = parseBody(upsertAnswersRequestSchema, req.body);
      res.json(await answers.upsertAnswers(req.params.id, req.params.questionId, input));
    } catch (error) {
      sendError(res, error, "Failed to save answers");
    }
  });

  app.post("/api/attempts/:id/complete", async (req, res) => {
    try {
      const { totalPoints } = parseBody(completeAttemptRequestSchema, req.body);
      res.json(await answers.completeAttemptById(req.params.id, totalPoints));
    } catch (error) {
      sendError(res, error, "Failed to complete attempt");
    }
  });

  app.put("/api/attempts/:id/snapshot", async (req, res) => {
    try {
      const { snapshot } = parseBody(saveSnapshotRequestSchema, req.body);
      const attemptSnapshot = await snapshotStorage.saveForAttempt(req.params.id, snapshot);
      res.json({ attemptSnapshot });
    } catch (error) {
      sendError(res, error, "Failed to save snapshot");
    }
  });

  app.get("/api/attempts/:id/snapshot", async (req, res) => {
    try {
      const content = await snapshotStorage.load(req.params.id);
      if (content === null) throw new NotFoundError("Snapshot", req.params.id);
      res.type("application/json").send(content);
    } catch (error) {
      sendError(res, error, "Failed to load snapshot");
    }
  });

  app.delete("/api/attempts/:id", async (req, res) => {
    try {
      await snapshotStorage.delete(req.params.id);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, "Failed to delete attempt");
    }
  });

  // ============================================
  // Students
  // ============================================

  app.get("/api/students/:studentId/tests/:testId/snapshots", async (req, res) => {
    try {
      res.json(await snapshotStorage.list(req.params.studentId, req.params.testId));
    } catch (error) {
      sendError(res, error, "Failed to list snapshots");
    }
  });

  app.get("/api/students/:studentId/tests/:testId/attempts", async (req, res) => {
    try {
      res.json(await attempts.listAttemptsByStudentAndTest(req.params.studentId, req.params.testId));
    } catch (error) {
      sendError(res, error, "Failed to fetch attempts");
    }
  });

  app.get("/api/students/:studentId/attempts", async (req, res) => {
    try {
      res.json(await reports.getStudentAttempts(req.params.studentId));
    } catch (error) {
      sendError(res, error, "Failed to fetch attempts");
    }
  });

  app.get("/api/students/:studentId/stats", async (req, res) => {
    try {
      res.json(await reports.getStudentStats(req.params.studentId));
    } catch (error) {
      sendError(res, error, "Failed to fetch statistics");
    }
  });
}
