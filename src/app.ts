import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import morgan from "morgan";
import multer from "multer";
import { z } from "zod";
import type { DiskMediaStore } from "./collaborators/media.js";
import { CivicError, NotFoundError, ValidationError } from "./errors.js";
import { createLogger, errorMessage } from "./logger.js";
import type { CivicIssueService } from "./services/civicService.js";
import { CATEGORIES, type SessionUser, type UserRole } from "./types.js";

const log = createLogger("http");

export interface AppOptions {
  service: CivicIssueService;
  media: DiskMediaStore;
  corsOrigin?: string;
  /** morgan format; `null` turns access logging off. */
  accessLog?: "dev" | "combined" | null;
}

type AuthenticatedRequest = Request & { user?: SessionUser };

const authSchema = z.object({
  email: z.string().email(),
  password: z.string().min(6)
});

const registerSchema = authSchema.extend({ name: z.string().trim().min(2) });

const reportBodySchema = z.object({
  category: z.string(),
  description: z.string(),
  location: z.object({ latitude: z.number(), longitude: z.number() }),
  mediaRef: z.string().nullish()
});

const transitionBodySchema = z.object({
  targetStatus: z.string(),
  note: z.string().nullish()
});

const priorityBodySchema = z.object({ priority: z.string() });

function sendError(res: Response, error: CivicError) {
  const details = error instanceof ValidationError ? error.details : undefined;
  res.status(error.status).json({ error: error.code, message: error.message, ...(details ? { details } : {}) });
}

function invalid(res: Response, message: string, issues: z.ZodError) {
  sendError(res, new ValidationError(message, issues.flatten()));
}

function bearerToken(req: Request) {
  return req.headers.authorization?.replace("Bearer ", "");
}

function asyncRoute(handler: (req: AuthenticatedRequest, res: Response) => Promise<void>) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function actorOf(user: SessionUser) {
  return String(user.id);
}

export function createApp({ service, media, corsOrigin = "*", accessLog = "dev" }: AppOptions) {
  const app = express();
  const upload = media.uploader();

  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());
  if (accessLog) app.use(morgan(accessLog));

  function auth(req: AuthenticatedRequest, res: Response, next: NextFunction) {
    const token = bearerToken(req);
    const sessionUser = token ? service.users.fromToken(token) : undefined;
    if (!sessionUser) {
      res.status(401).json({ error: "Unauthorized", message: "Sign in first" });
      return;
    }
    req.user = sessionUser;
    next();
  }

  function requireRole(...roles: UserRole[]) {
    return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      if (!req.user || !roles.includes(req.user.role)) {
        res.status(403).json({ error: "Unauthorized", message: `Requires role ${roles.join(" or ")}` });
        return;
      }
      next();
    };
  }

  function sessionOf(req: AuthenticatedRequest, res: Response): SessionUser | undefined {
    if (!req.user) res.status(401).json({ error: "Unauthorized", message: "Sign in first" });
    return req.user;
  }

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/api/auth/login", (req, res) => {
    const parsed = authSchema.safeParse(req.body);
    if (!parsed.success) {
      invalid(res, "Invalid payload", parsed.error);
      return;
    }

    const user = service.users.verify(parsed.data.email, parsed.data.password);
    if (!user) {
      res.status(401).json({ error: "Unauthorized", message: "Invalid credentials" });
      return;
    }
    res.json({ token: service.users.openSession(user), user });
  });

  app.post("/api/auth/register", (req, res) => {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      invalid(res, "Invalid payload", parsed.error);
      return;
    }

    const { email, password, name } = parsed.data;
    if (service.users.exists(email)) {
      sendError(res, new ValidationError("Email already registered"));
      return;
    }
    const user = service.users.create({ email, password, name, role: "citizen" });
    res.status(201).json({ token: service.users.openSession(user), user });
  });

  app.post("/api/auth/logout", auth, (req: AuthenticatedRequest, res) => {
    const token = bearerToken(req);
    if (token) service.users.closeSession(token);
    res.json({ success: true });
  });

  app.get("/api/categories", (_req, res) => {
    res.json(CATEGORIES);
  });

  app.post("/api/media", auth, upload.single("photo"), (req: AuthenticatedRequest, res) => {
    if (!req.file) {
      sendError(res, new ValidationError("Attach an image as the photo field"));
      return;
    }
    res.status(201).json({ mediaRef: media.referenceFor(req.file.filename) });
  });

  app.get("/api/media/:name", auth, (req, res) => {
    const filePath = media.resolve(media.referenceFor(req.params.name));
    if (!filePath) {
      sendError(res, new NotFoundError("media", req.params.name));
      return;
    }
    res.sendFile(filePath);
  });

  app.post(
    "/api/reports",
    auth,
    requireRole("citizen"),
    asyncRoute(async (req, res) => {
      const user = sessionOf(req, res);
      if (!user) return;
      const parsed = reportBodySchema.safeParse(req.body);
      if (!parsed.success) {
        invalid(res, "Invalid report", parsed.error);
        return;
      }

      const result = await service.submitReport({ ...parsed.data, submitterId: actorOf(user) });
      if (!result.ok) {
        sendError(res, result.error);
        return;
      }
      const { reportId, issueId, status } = result.value;
      res.status(201).json({ reportId, issueId, status });
    })
  );

  app.get("/api/reports/mine", auth, requireRole("citizen"), (req: AuthenticatedRequest, res) => {
    const user = sessionOf(req, res);
    if (!user) return;
    res.json(service.reportsBySubmitter(actorOf(user)));
  });

  app.get("/api/reports/:id", auth, (req: AuthenticatedRequest, res) => {
    const user = sessionOf(req, res);
    if (!user) return;
    const result = service.getReport(req.params.id);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    if (user.role === "citizen" && result.value.submitterId !== actorOf(user)) {
      res.status(403).json({ error: "Unauthorized", message: "Not your report" });
      return;
    }
    res.json(result.value);
  });

  app.get("/api/issues", (req, res) => {
    const result = service.listIssues(req.query);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  });

  app.get("/api/issues/:id", (req, res) => {
    const result = service.getIssue(req.params.id);
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  });

  app.post(
    "/api/issues/:id/transition",
    auth,
    requireRole("authority", "admin"),
    asyncRoute(async (req, res) => {
      const user = sessionOf(req, res);
      if (!user) return;
      const parsed = transitionBodySchema.safeParse(req.body);
      if (!parsed.success) {
        invalid(res, "Invalid transition request", parsed.error);
        return;
      }

      const result = await service.transition(req.params.id, parsed.data.targetStatus, actorOf(user), parsed.data.note);
      if (!result.ok) {
        sendError(res, result.error);
        return;
      }
      res.json(result.value);
    })
  );

  app.patch(
    "/api/issues/:id/priority",
    auth,
    requireRole("authority", "admin"),
    asyncRoute(async (req, res) => {
      const user = sessionOf(req, res);
      if (!user) return;
      const parsed = priorityBodySchema.safeParse(req.body);
      if (!parsed.success) {
        invalid(res, "Invalid priority", parsed.error);
        return;
      }

      const result = await service.setPriority(req.params.id, parsed.data.priority, actorOf(user));
      if (!result.ok) {
        sendError(res, result.error);
        return;
      }
      res.json(result.value);
    })
  );

  app.get("/api/notifications", auth, (req: AuthenticatedRequest, res) => {
    const user = sessionOf(req, res);
    if (!user) return;
    res.json(service.inbox.list(actorOf(user)));
  });

  app.post("/api/notifications/:id/read", auth, (req: AuthenticatedRequest, res) => {
    const user = sessionOf(req, res);
    if (!user) return;
    const result = service.inbox.markRead(req.params.id, actorOf(user));
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.json(result.value);
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof CivicError) {
      sendError(res, error);
      return;
    }
    if (error instanceof multer.MulterError) {
      sendError(res, new ValidationError(error.message, { field: error.field ?? null }));
      return;
    }
    if (error instanceof SyntaxError) {
      sendError(res, new ValidationError("Malformed JSON body"));
      return;
    }
    log.error("Unhandled request error", { error: errorMessage(error) });
    res.status(500).json({ error: "Internal", message: "Something went wrong" });
  });

  return app;
}
