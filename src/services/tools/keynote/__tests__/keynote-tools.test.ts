import { describe, it, expect, vi } from 'vitest';
import { createKeynoteTools, LAUNCH_SETTLE_MS } from '../keynote-tools.js';
import type { ScriptBridge, ScriptOutcome } from '../applescript.js';
import { ToolRegistry } from '../../registry.js';

function fakeBridge(outcome: ScriptOutcome = { ok: true, output: 'ok' }) {
  return {
    runAppleScript: vi.fn<ScriptBridge['runAppleScript']>(async () => outcome),
    openApplication: vi.fn<ScriptBridge['openApplication']>(async name => ({ ok: true, output: `${name} opened` })),
  };
}

function registryWith(bridge: ScriptBridge, sleep = vi.fn(async (_ms: number) => {})) {
  const registry = new ToolRegistry();
  for (const tool of createKeynoteTools(bridge, { sleep })) {
    registry.register(tool);
  }
  return registry;
}

describe('Keynote tools', () => {
  it('should advertise the four operations in order', () => {
    const registry = registryWith(fakeBridge());
    expect(registry.toDescriptors().map(d => d.name)).toEqual([
      'open_keynote',
      'create_blank_keynote_slide',
      'draw_keynote_rectangle',
      'add_text_in_keynote',
    ]);
    expect(registry.get('add_text_in_keynote')?.parameters.map(p => p.name)).toEqual(['text', 'x', 'y', 'width', 'height']);
  });

  it('should open Keynote and wait for it to settle', async () => {
    const bridge = fakeBridge();
    const sleep = vi.fn(async (_ms: number) => {});
    const registry = registryWith(bridge, sleep);

    const result = await registry.invoke('open_keynote', {});

    expect(result).toEqual({ tool: 'open_keynote', success: true, content: 'Keynote opened successfully.' });
    expect(bridge.openApplication).toHaveBeenCalledWith('Keynote');
    expect(sleep).toHaveBeenCalledWith(LAUNCH_SETTLE_MS);
  });

  it('should report a launch failure without waiting', async () => {
    const bridge = fakeBridge();
    bridge.openApplication.mockResolvedValueOnce({ ok: false, output: 'Error opening Keynote: Unable to find application' });
    const sleep = vi.fn(async (_ms: number) => {});

    const result = await registryWith(bridge, sleep).invoke('open_keynote', {});

    expect(result).toEqual({
      tool: 'open_keynote',
      success: false,
      content: 'Error opening Keynote: Unable to find application',
    });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should return the blank slide script output', async () => {
    const bridge = fakeBridge({ ok: true, output: 'Blank slide ready in the front document.' });
    const result = await registryWith(bridge).invoke('create_blank_keynote_slide', {});
    expect(result.content).toBe('Blank slide ready in the front document.');
    expect(result.success).toBe(true);
  });

  it('should draw a rectangle', async () => {
    const bridge = fakeBridge();
    const result = await registryWith(bridge).invoke('draw_keynote_rectangle', { x1: 100, y1: 100, width: 400, height: 250 });

    expect(result).toEqual({
      tool: 'draw_keynote_rectangle',
      success: true,
      content: 'Rectangle drawn successfully at (100,100) with size 400x250.',
    });
    expect(bridge.runAppleScript).toHaveBeenCalledTimes(1);
  });

  it('should add text', async () => {
    const result = await registryWith(fakeBridge()).invoke('add_text_in_keynote', {
      text: 'Agent Control Test', x: 120, y: 130, width: 360, height: 50,
    });

    expect(result.content).toBe("Text 'Agent Control Test' added successfully in a box at (120,130).");
  });

  it('should reject non-positive sizes before running a script', async () => {
    const bridge = fakeBridge();
    const result = await registryWith(bridge).invoke('draw_keynote_rectangle', { x1: 0, y1: 0, width: 0, height: 10 });

    expect(result.success).toBe(false);
    expect(result.content).toBe('Error: Invalid arguments for draw_keynote_rectangle: width: width must be >= 1');
    expect(bridge.runAppleScript).not.toHaveBeenCalled();
  });

  it('should reject coordinates out of range', async () => {
    const bridge = fakeBridge();
    const result = await registryWith(bridge).invoke('draw_keynote_rectangle', { x1: 20000, y1: 0, width: 10, height: 10 });

    expect(result.content).toBe('Error: Invalid arguments for draw_keynote_rectangle: x1: x1 must be <= 10000');
  });

  it('should pass script errors through as failures', async () => {
    const bridge = fakeBridge({ ok: false, output: 'Error executing AppleScript: No Keynote document is open.' });
    const result = await registryWith(bridge).invoke('add_text_in_keynote', {
      text: 'x', x: 0, y: 0, width: 10, height: 10,
    });

    expect(result).toEqual({
      tool: 'add_text_in_keynote',
      success: false,
      content: 'Error executing AppleScript: No Keynote document is open.',
    });
  });
});
