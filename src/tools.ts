import type { ToolInfo } from "./types";

export const availableTools: readonly ToolInfo[] = [
  { name: "wave_hello", description: "Wave antennas to greet" },
  { name: "look_around", description: "Look around the room" },
  { name: "express_emotion", description: "Express an emotion (happy, sad, curious, excited)" },
  { name: "move_head", description: "Move head (left, right, up, down, center)" },
  { name: "describe_scene", description: "Describe what the camera sees" },
  { name: "nod_yes", description: "Nod head yes" },
  { name: "shake_head_no", description: "Shake head no" },
  { name: "get_time", description: "Get current time" },
  { name: "set_timer", description: "Set a timer" }
];
