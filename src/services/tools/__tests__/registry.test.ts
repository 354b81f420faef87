import { describe, it, expect } from 'vitest';
import { ToolRegistry } from '../registry.js';
import { ToolFailureError } from '../failures.js';
import { FailureKind } from '../types.js';
import type { ToolDefinition } from '../types.js';

function tool(name: string, exports: string[] = []): ToolDefinition {
  return {
    name,
    description: `${name} tool`,
    kind: 'structured-data',
    category: 'data',
    effect: 'read',
    parameters: [
      {
        name: 'input',
        type: 'string',
        description: 'Test input',
        required: true,
      },
    ],
    exports,
    invoke: async () => ({ success: true, content: '', data: null, exports: {} }),
  };
}

describe('Tool Registry', () => {
  it('should register and retrieve tools', () => {
    const registry = new ToolRegistry();
    const testTool = tool('test_tool');

    registry.register(testTool);

    expect(registry.has('test_tool')).toBe(true);
    expect(registry.lookup('test_tool')).toBe(testTool);
    expect(registry.lookup('missing')).toBeUndefined();
  });

  it('should list tools in registration order', () => {
    const registry = new ToolRegistry();
    registry.register(tool('tool2'));
    registry.register(tool('tool1'));

    expect(registry.list().map(t => t.name)).toEqual(['tool2', 'tool1']);
    expect(registry.size).toBe(2);
  });

  it('should reject duplicate names', () => {
    const registry = new ToolRegistry();
    registry.register(tool('dup'));

    expect(() => registry.register(tool('dup'))).toThrow('Tool "dup" is already registered');
  });

  it('should refuse registration once frozen', () => {
    const registry = new ToolRegistry().freeze();

    expect(registry.isFrozen).toBe(true);
    expect(() => registry.register(tool('late'))).toThrow('Tool registry is frozen; cannot register "late"');
  });

  it('should index producers by export in registration order', () => {
    const registry = new ToolRegistry();
    registry.register(tool('directory', ['employee_id', 'email']));
    registry.register(tool('hr_system', ['employee_id']));
    registry.register(tool('mailer'));

    expect(registry.toolsExporting('employee_id').map(t => t.name)).toEqual(['directory', 'hr_system']);
    expect(registry.toolsExporting('email').map(t => t.name)).toEqual(['directory']);
    expect(registry.toolsExporting('nothing')).toEqual([]);
    expect(registry.defaultProducer('employee_id')?.name).toBe('directory');
    expect(registry.defaultProducer('nothing')).toBeUndefined();
  });

  it('should raise an internal fault when a required tool is missing', () => {
    const registry = new ToolRegistry();

    try {
      registry.require('ghost');
      expect.unreachable('require should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ToolFailureError);
      if (error instanceof ToolFailureError) {
        expect(error.detail.kind).toBe(FailureKind.INTERNAL_FAULT);
        expect(error.detail.context).toEqual({ tool: 'ghost' });
      }
    }
  });
});
