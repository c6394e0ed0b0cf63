/**
 * Runtime configuration for the planner gateway.
 *
 * This centralises environment variables and provides
 * typed access throughout the codebase.
 */
import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  serviceName: string;
  serviceVersion: string;
}

/**
 * Directory layout used by the planning service.
 * Relative environment overrides are resolved against the project root.
 */
export interface AppPaths {
  root: string;
  templates: string;
  problemTemplate: string;
  domain: string;
  output: string;
  pddl: string;
  plan: string;
}

const DEFAULT_PORT = 4000;

const PROJECT_ROOT = path.resolve(__dirname, '..', '..', '..');

function parsePort(raw: string | undefined, fallback: number): number {
  const port = raw ? Number(raw) : fallback;
  if (Number.isNaN(port) || port <= 0) {
    return fallback;
  }
  return port;
}

function parseEnv(raw: string | undefined): AppConfig['env'] {
  if (raw === 'test' || raw === 'production') return raw;
  return 'development';
}

function resolveFromRoot(raw: string | undefined, fallback: string): string {
  const value = raw && raw.trim().length > 0 ? raw : fallback;
  return path.isAbsolute(value) ? value : path.resolve(PROJECT_ROOT, value);
}

/**
 * Load configuration from environment variables with sane defaults.
 */
export const config: AppConfig = {
  env: parseEnv(process.env.NODE_ENV),
  port: parsePort(process.env.PORT, DEFAULT_PORT),
  serviceName: process.env.SERVICE_NAME || 'planner-gateway',
  serviceVersion: process.env.SERVICE_VERSION || '0.1.0',
};

/**
 * Resolve the directory layout from the given environment.
 */
export function getPaths(env: NodeJS.ProcessEnv = process.env): AppPaths {
  const templates = path.join(PROJECT_ROOT, 'templates');
  const output = resolveFromRoot(env.OUTPUT_DIR, 'output');

  return {
    root: PROJECT_ROOT,
    templates,
    problemTemplate: path.join(templates, 'problem_template.pddl'),
    domain: resolveFromRoot(env.PDDL_DOMAIN_PATH, path.join('templates', 'domain.pddl')),
    output,
    pddl: path.join(output, 'pddl'),
    plan: path.join(output, 'plan'),
  };
}
