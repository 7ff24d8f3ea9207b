import path from "path";

export type SiteConfig = {
  port: number;
  host: string;
  templatesDir: string;
  resourcesDir: string;
};

const PROJECT_ROOT = path.resolve(__dirname, "..");

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SiteConfig {
  const port = Number(env.PORT || "5000");
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT value: ${env.PORT}`);
  }

  return {
    port,
    host: env.HOST || "127.0.0.1",
    templatesDir: path.resolve(
      PROJECT_ROOT,
      env.SITE_TEMPLATES_DIR || "templates",
    ),
    resourcesDir: path.resolve(
      PROJECT_ROOT,
      env.SITE_RESOURCES_DIR || "resources",
    ),
  };
}
