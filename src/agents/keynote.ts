// Keynote agent - one fixed instruction: prepare a slide, draw and label a box

import type { AgentDefinition } from '../services/orchestrator/types.js';

export const keynoteAgent: AgentDefinition = {
  name: 'keynote',
  role: 'You are an agent controlling Apple Keynote on macOS. You have access to tools to interact with Keynote.',
  rules: [
    'Call `open_keynote` first.',
    'Call `create_blank_keynote_slide` before drawing or adding text.',
    'Coordinates and sizes are integers in points.',
    'Do not imagine tools that are not listed.',
  ],
  instruction:
    'Please open Keynote, create a blank slide, draw a rectangle from (100, 100) with width 400 and height 250, ' +
    'and then add the text \'Agent Control Test\' inside the rectangle at position (120, 130) with width 360 and height 50.',
};
