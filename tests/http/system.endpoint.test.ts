import path from 'path';
import request from 'supertest';

import { createApp } from '../../src/app';
import type { PlanningServicePort } from '../../src/http/routes/planRoutes';
import { configurationFailure } from '../../src/planning/domain/Failure';
import { err } from '../../src/planning/domain/Result';

const idleService: PlanningServicePort = {
  runTask: async () => err(configurationFailure('unused')),
  explain: () => err(configurationFailure('unused')),
  validateConfiguration: async () => ({
    domainFileExists: true,
    templateFileExists: true,
    outputDirectoriesReady: true,
    plannerCommand: 'fast-downward.py',
    searchAlgorithm: 'astar(blind())',
  }),
};

describe('GET /v1/system/info', () => {
  test('lists planning capabilities when planning is mounted', async () => {
    const app = createApp({ planningService: idleService });

    const res = await request(app).get('/v1/system/info').expect(200);

    expect(res.body.success).toBe(true);
    expect(res.body.server_info).toEqual({
      name: 'planner-gateway',
      version: '0.1.0',
      framework: 'express',
      capabilities: ['generate_plan', 'explain_plan', 'validate_config', 'system_info'],
    });
    expect(res.body.system_info.node_version).toBe(process.version);
    expect(res.body.system_info.project_root).toBe(path.resolve(__dirname, '..', '..'));
  });

  test('lists only itself without a planning service', async () => {
    const app = createApp();

    const res = await request(app).get('/v1/system/info').expect(200);

    expect(res.body.server_info.capabilities).toEqual(['system_info']);
  });
});
