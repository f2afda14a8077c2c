// Tool call parser
// Models announce a tool call in plain text:
//
//   TOOL: <tool_name>
//   INPUT: <json_input>
//
// JSON spanning several lines is stitched back together up to the first
// line containing a closing brace. The JSON itself is not validated here.

import type { ToolCallRequest } from '../tools/types.js';

const TOOL_MARKER = 'TOOL:';
const INPUT_MARKER = 'INPUT:';

export function parseToolCall(response: string): ToolCallRequest | null {
  const lines = response.split('\n');

  const toolIndex = lines.findIndex(line => line.startsWith(TOOL_MARKER));
  if (toolIndex === -1) return null;

  const toolName = lines[toolIndex].slice(TOOL_MARKER.length).trim();
  if (!toolName) return null;

  let inputIndex = -1;
  for (let i = toolIndex + 1; i < lines.length; i++) {
    if (lines[i].startsWith(INPUT_MARKER)) {
      inputIndex = i;
      break;
    }
  }
  if (inputIndex === -1) return null;

  let rawInput = lines[inputIndex].slice(INPUT_MARKER.length).trim();
  if (!rawInput.endsWith('}')) {
    for (let i = inputIndex + 1; i < lines.length; i++) {
      rawInput += lines[i];
      if (lines[i].includes('}')) break;
    }
  }

  return { toolName, rawInput };
}
