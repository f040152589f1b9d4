import { describe, it, expect, vi, afterEach } from 'vitest';
import { runDemo } from '../demo.js';
import { createContainer } from '../../infra/container.js';

describe('runDemo', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should run every example against a fresh container', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const container = createContainer({ nodeEnv: 'test', logEvents: false, defaultPageSize: 10 });

    await runDemo(container);

    expect(log).toHaveBeenCalledWith('Stock after two deliveries: 25');
    expect(log).toHaveBeenCalledWith('Bulk created 2 users, 1 failed');
    await expect(
      container.services.productManagementService.getCategoryStatistics()
    ).resolves.toEqual({ peripherals: 2, office: 1 });
  });
});
