import { describe, expect, it, vi } from 'vitest';

vi.mock('../../../src/shared/logging/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { bootstrapResearch } from '../../../src/app/bootstrap';
import { parseEnv } from '../../../src/shared/config/env';
import { ResearchPipeline } from '../../../src/core/research/researchPipeline';
import { AppError } from '../../../src/shared/errors/app-error';

describe('bootstrapResearch', () => {
  it('wires a pipeline when both services are configured', () => {
    const env = parseEnv({ LLM_API_KEY: 'test-secret', PARALLEL_API_KEY: 'test-secret' });

    expect(bootstrapResearch({ env })).toBeInstanceOf(ResearchPipeline);
  });

  it('fails with CONFIG_INVALID when the search key is missing', () => {
    const env = parseEnv({ LLM_API_KEY: 'test-secret' });

    let caught: unknown;
    try {
      bootstrapResearch({ env });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({
      code: 'CONFIG_INVALID',
      message: 'PARALLEL_API_KEY is not set. Add it to your environment or .env file.',
    });
  });
});
