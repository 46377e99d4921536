import { z } from 'zod';
import { ToolRegistry } from '../../../src/tools/registry.js';
import type { RegisteredTool } from '../../../src/types/tool.js';

const tool = (name: string): RegisteredTool => ({
  metadata: { name, description: `${name} tool`, riskLevel: 'read-only', inputSchema: z.object({}) },
  execute: async () => ({ status: 'success', tool: name, target_host: 'localhost', duration_ms: 0, command_executed: null, data: {} }),
});

describe('ToolRegistry', () => {
  it('keeps registration order', () => {
    const registry = new ToolRegistry();
    registry.register(tool('mirror_rank'));
    registry.register(tool('mirror_best'));
    expect(registry.names()).toEqual(['mirror_rank', 'mirror_best']);
    expect([...registry].map((t) => t.metadata.name)).toEqual(['mirror_rank', 'mirror_best']);
    expect(registry.size).toBe(2);
    expect(registry.get('mirror_best')?.metadata.description).toBe('mirror_best tool');
  });

  it('refuses a second tool with the same name', () => {
    const registry = new ToolRegistry();
    registry.register(tool('mirror_rank'));
    expect(() => registry.register(tool('mirror_rank'))).toThrow("Tool 'mirror_rank' is already registered");
  });
});
