import { ToolRegistry } from '../../src/tools/application/ToolRegistry';
import type { ToolDefinition, ToolHandler } from '../../src/tools/domain/Tool';
import {
  DuplicateToolError,
  RegistryFrozenError,
  UnknownToolError,
} from '../../src/tools/domain/ToolErrors';

const noopHandler: ToolHandler = async () => ({});

function definition(name: string): ToolDefinition {
  return {
    name,
    description: `${name} tool`,
    inputSchema: { city: { type: 'string', required: false } },
  };
}

describe('ToolRegistry', () => {
  it('lists definitions in registration order', () => {
    const registry = new ToolRegistry()
      .register(definition('get_weather'), noopHandler)
      .register(definition('get_air_quality'), noopHandler)
      .register(definition('get_sunrise'), noopHandler);

    expect(registry.list().map((d) => d.name)).toEqual(['get_weather', 'get_air_quality', 'get_sunrise']);
  });

  it('rejects a second tool with the same name', () => {
    const registry = new ToolRegistry().register(definition('get_weather'), noopHandler);

    expect(() => registry.register(definition('get_weather'), noopHandler)).toThrow(DuplicateToolError);
    expect(registry.list()).toHaveLength(1);
  });

  it('returns the registered handler by name', () => {
    const handler: ToolHandler = async () => ({ ok: 1 });
    const registry = new ToolRegistry().register(definition('get_weather'), handler);

    expect(registry.get('get_weather').handler).toBe(handler);
    expect(registry.has('get_weather')).toBe(true);
    expect(registry.has('get_stock_price')).toBe(false);
  });

  it('throws UnknownToolError for an unregistered name', () => {
    const registry = new ToolRegistry();

    expect(() => registry.get('get_stock_price')).toThrow(UnknownToolError);
    expect(() => registry.get('get_stock_price')).toThrow('Tool not available: get_stock_price');
  });

  it('refuses registrations once frozen', () => {
    const registry = new ToolRegistry().register(definition('get_weather'), noopHandler).freeze();

    expect(registry.isFrozen()).toBe(true);
    expect(() => registry.register(definition('get_sunrise'), noopHandler)).toThrow(RegistryFrozenError);
  });

  it('stores an immutable copy of the definition', () => {
    const original = definition('get_weather');
    const registry = new ToolRegistry().register(original, noopHandler);

    const stored = registry.get('get_weather').definition;
    expect(stored).toEqual(original);
    expect(stored).not.toBe(original);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.inputSchema)).toBe(true);
    expect(Object.isFrozen(stored.inputSchema.city)).toBe(true);
  });
});
