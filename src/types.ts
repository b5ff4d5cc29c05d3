export type LogType = "info" | "tool" | "speech" | "error" | "face" | "latency";

export type ConversationRole = "user" | "eva" | "tool";

export interface DashboardState {
  robot_connected: boolean;
  openai_connected: boolean;
  webrtc_connected: boolean;
  speaking: boolean;
  listening: boolean;
  head_yaw: number;
  // 0-100, left to right
  face_position: number;
  active_timer: string;
  last_user_message: string;
  last_eva_message: string;
}

export interface LogEntry {
  time: string;
  type: LogType;
  message: string;
}

export interface ConversationEntry {
  time: string;
  role: ConversationRole;
  message: string;
}

export interface ToolInfo {
  name: string;
  description: string;
}

export type ToolArgs = Record<string, unknown>;

/**
 * Optional integrations wired in by whatever process drives the robot.
 * Routes answer 503 (or 500 for tools) while a hook is missing.
 */
export interface DashboardHooks {
  readonly onToolTrigger?: (name: string, args: ToolArgs) => Promise<string>;
  readonly onGetTuningParams?: () => unknown;
  readonly onSetTuningParams?: (params: Record<string, unknown>) => void;
  readonly onSetTuningMode?: (enabled: boolean) => void;
  readonly onGetCameraConfig?: () => unknown;
  readonly onSetCameraConfig?: (params: Record<string, unknown>) => void;
  // Google Docs sync ("Spark")
  readonly onSparkGetStatus?: () => unknown;
  /** Returns the OAuth consent URL the browser is redirected to. */
  readonly onSparkAuthStart?: () => string;
  readonly onSparkAuthCallback?: (code: string) => Promise<void> | void;
  readonly onSparkDisconnect?: () => Promise<void> | void;
}

export function initialDashboardState(): DashboardState {
  return {
    robot_connected: false,
    openai_connected: false,
    webrtc_connected: false,
    speaking: false,
    listening: false,
    head_yaw: 0,
    face_position: 0,
    active_timer: "",
    last_user_message: "",
    last_eva_message: ""
  };
}
