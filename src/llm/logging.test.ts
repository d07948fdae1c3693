import { describe, it, expect, vi } from 'vitest';
import { InMemoryStorage } from '../storage/in-memory.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { LLMClient } from './client.js';
import { useLLMLogging } from './logging.js';

function mockLogger() {
  const debug = vi.fn();
  const logger: Logger = {
    debug,
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    setLevel: vi.fn(),
    child: () => logger,
  };
  return { logger, debug };
}

describe('useLLMLogging', () => {
  it('logs prompts and responses at debug level until detached', async () => {
    const client = new LLMClient(
      { backend: 'function', inferenceFunction: () => 'hello' },
      { logger: silentLogger, storage: new InMemoryStorage() },
    );
    const { logger, debug } = mockLogger();
    const detach = useLLMLogging(client, logger);

    await client.generate([{ role: 'system', content: 'Be brief.' }, 'Hi'], { fileCache: true });
    await client.generate([{ role: 'system', content: 'Be brief.' }, 'Hi'], { fileCache: true });

    expect(debug).toHaveBeenCalledTimes(4);
    expect(debug.mock.calls[0][0]).toBe('Requesting local:\nBe brief.\nHi');
    expect(debug.mock.calls[1][0]).toMatch(/^Response from local \(\d+\.\d{2}s\):\nhello$/);
    expect(debug.mock.calls[3][0]).toBe('Response from local (cache):\nhello');

    detach();
    await client.generate('Hi');
    expect(debug).toHaveBeenCalledTimes(4);
  });
});
