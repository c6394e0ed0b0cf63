// src/http/routes/systemRoutes.ts

import os from 'os';
import type { Request, Response } from 'express';
import { Router } from 'express';

import { config } from '../../shared/config/Config';

const PLANNING_CAPABILITIES = ['generate_plan', 'explain_plan', 'validate_config'];

export type SystemInfo = {
  success: true;
  server_info: {
    name: string;
    version: string;
    framework: 'express';
    capabilities: string[];
  };
  system_info: {
    platform: string;
    node_version: string;
    working_directory: string;
    project_root: string;
    uptime_seconds: number;
  };
};

/**
 * GET /v1/system/info: server identity, the mounted capabilities and runtime facts.
 */
export function createSystemRoutes(params: { planningEnabled: boolean; projectRoot: string }): Router {
  const router = Router();

  router.get('/v1/system/info', (_req: Request, res: Response) => {
    const body: SystemInfo = {
      success: true,
      server_info: {
        name: config.serviceName,
        version: config.serviceVersion,
        framework: 'express',
        capabilities: [...(params.planningEnabled ? PLANNING_CAPABILITIES : []), 'system_info'],
      },
      system_info: {
        platform: `${os.platform()}-${os.release()}-${os.arch()}`,
        node_version: process.version,
        working_directory: process.cwd(),
        project_root: params.projectRoot,
        uptime_seconds: Math.round(process.uptime()),
      },
    };

    res.status(200).json(body);
  });

  return router;
}
