// Keynote Tools
// Each operation is a single fire-and-forget command; nothing reads back slide state

import type { ToolDefinition, ToolParameter, ToolResult } from '../types.js';
import type { ScriptBridge } from './applescript.js';
import { blankSlideScript, rectangleScript, textBoxScript } from './scripts.js';
import type { Box } from './scripts.js';

export const COORDINATE_LIMIT = 10000;
export const LAUNCH_SETTLE_MS = 2000;

function coordinate(name: string, description: string): ToolParameter {
  return { name, type: 'integer', description, min: -COORDINATE_LIMIT, max: COORDINATE_LIMIT };
}

function size(name: string, description: string): ToolParameter {
  return { name, type: 'integer', description, min: 1, max: COORDINATE_LIMIT };
}

function boxFrom(args: Record<string, string | number>, xKey: string, yKey: string): Box {
  return {
    x: Number(args[xKey]),
    y: Number(args[yKey]),
    width: Number(args.width),
    height: Number(args.height),
  };
}

export interface KeynoteToolOptions {
  settleMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export function createKeynoteTools(bridge: ScriptBridge, options: KeynoteToolOptions = {}): ToolDefinition[] {
  const settleMs = options.settleMs ?? LAUNCH_SETTLE_MS;
  const sleep = options.sleep ?? defaultSleep;

  const openKeynote: ToolDefinition = {
    name: 'open_keynote',
    description: 'Opens the Keynote application.',
    parameters: [],
    async execute(): Promise<ToolResult> {
      const outcome = await bridge.openApplication('Keynote');
      if (!outcome.ok) {
        return { success: false, content: outcome.output };
      }
      await sleep(settleMs);
      return { success: true, content: 'Keynote opened successfully.' };
    },
  };

  const createBlankSlide: ToolDefinition = {
    name: 'create_blank_keynote_slide',
    description: 'Ensures a blank slide is current in the front Keynote document, creating the document or a new blank slide when needed.',
    parameters: [],
    async execute(): Promise<ToolResult> {
      const outcome = await bridge.runAppleScript(blankSlideScript());
      return { success: outcome.ok, content: outcome.output };
    },
  };

  const drawRectangle: ToolDefinition = {
    name: 'draw_keynote_rectangle',
    description: 'Draws a rectangle on the current Keynote slide. (x1, y1) is the top-left corner in points; width and height set the size.',
    parameters: [
      coordinate('x1', 'Left edge in points'),
      coordinate('y1', 'Top edge in points'),
      size('width', 'Width in points'),
      size('height', 'Height in points'),
    ],
    async execute(args): Promise<ToolResult> {
      const box = boxFrom(args, 'x1', 'y1');
      const outcome = await bridge.runAppleScript(rectangleScript(box));
      if (!outcome.ok) {
        return { success: false, content: outcome.output };
      }
      return {
        success: true,
        content: `Rectangle drawn successfully at (${box.x},${box.y}) with size ${box.width}x${box.height}.`,
      };
    },
  };

  const addText: ToolDefinition = {
    name: 'add_text_in_keynote',
    description: 'Adds a text box with the given text to the current Keynote slide. (x, y) is the top-left corner in points; width and height set the box size.',
    parameters: [
      { name: 'text', type: 'string', description: 'Text to place in the box', min: 1 },
      coordinate('x', 'Left edge in points'),
      coordinate('y', 'Top edge in points'),
      size('width', 'Width in points'),
      size('height', 'Height in points'),
    ],
    async execute(args): Promise<ToolResult> {
      const text = String(args.text);
      const box = boxFrom(args, 'x', 'y');
      const outcome = await bridge.runAppleScript(textBoxScript(text, box));
      if (!outcome.ok) {
        return { success: false, content: outcome.output };
      }
      return {
        success: true,
        content: `Text '${text}' added successfully in a box at (${box.x},${box.y}).`,
      };
    },
  };

  return [openKeynote, createBlankSlide, drawRectangle, addText];
}
