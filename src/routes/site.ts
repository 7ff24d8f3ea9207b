import { promises as fs } from "fs";
import path from "path";
import {
  Router,
  type NextFunction,
  type Request,
  type Response,
} from "express";

export type SiteRouterOptions = {
  templatesDir: string;
  resourcesDir: string;
};

const RESUME_FILENAME = "resume.pdf";

/**
 * Resolve `filename` inside `dir`, or null when it would escape the
 * directory (e.g. "../secret.txt").
 */
export function resolveInside(dir: string, filename: string): string | null {
  const root = path.resolve(dir);
  const target = path.resolve(root, filename);
  const relative = path.relative(root, target);

  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    return null;
  }

  return target;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

function sendNotFound(res: Response, message: string): void {
  res.status(404).json({
    error: { message },
  });
}

export function createSiteRouter(options: SiteRouterOptions): Router {
  const router = Router();

  // -------------------------------------------------------------------------
  // GET /
  //
  // The resume page.
  // -------------------------------------------------------------------------
  router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const indexPath = path.join(options.templatesDir, "index.html");

      if (!(await fileExists(indexPath))) {
        sendNotFound(res, "Page not found.");
        return;
      }

      const html = await fs.readFile(indexPath, "utf8");
      res.type("html").send(html);
    } catch (error) {
      next(error);
    }
  });

  // -------------------------------------------------------------------------
  // GET /resume.pdf
  //
  // Streams the resume from the resources directory inline, so the browser
  // can display or download it.
  // -------------------------------------------------------------------------
  router.get(
    "/resume.pdf",
    async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const resumePath = path.join(options.resourcesDir, RESUME_FILENAME);

        if (!(await fileExists(resumePath))) {
          sendNotFound(res, "Resume not found.");
          return;
        }

        const fileBuffer = await fs.readFile(resumePath);
        res.setHeader("Content-Type", "application/pdf");
        res.setHeader(
          "Content-Disposition",
          `inline; filename="${RESUME_FILENAME}"`,
        );
        res.setHeader("Content-Length", fileBuffer.length);
        res.send(fileBuffer);
      } catch (error) {
        next(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // GET /resources/:filename
  //
  // Any file directly inside the resources directory. Names that resolve
  // outside it are answered like missing files.
  // -------------------------------------------------------------------------
  router.get(
    "/resources/:filename",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const filePath = resolveInside(
          options.resourcesDir,
          req.params.filename,
        );

        if (!filePath || !(await fileExists(filePath))) {
          sendNotFound(res, "File not found.");
          return;
        }

        const fileBuffer = await fs.readFile(filePath);
        res.type(path.extname(filePath) || "application/octet-stream");
        res.send(fileBuffer);
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
