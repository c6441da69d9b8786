#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { createInterface } from 'node:readline/promises';
import { createLogger } from '@workspace/shared-utils';
import { OAuthStateStore } from '@workspace/compliance-client';
import {
  createArtifactStore,
  createLiveGate,
  createOrchestrator,
  getComplianceClient,
  serviceStatus,
} from './bootstrap.js';
import { createProgram } from './cli.js';

const logger = createLogger('risk-analyzer');

const program = createProgram({
  orchestrator: createOrchestrator,
  liveGate: createLiveGate,
  complianceClient: getComplianceClient,
  artifactStore: createArtifactStore,
  oauthStates: new OAuthStateStore(),
  status: serviceStatus,
  io: {
    readFile: (path) => readFile(path, 'utf-8'),
    ask: async (question) => {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      try {
        return await rl.question(question);
      } finally {
        rl.close();
      }
    },
    print: (value) => console.log(JSON.stringify(value, null, 2)),
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('CLI 실행 실패', { error });
  process.exitCode = 1;
});
