export const cameraPresets: readonly string[] = [
  "default",
  "legacy",
  "720p",
  "1080p",
  "4k",
  "night",
  "bright",
  "zoom2x",
  "zoom4x"
];

// IMX708 wide module on the robot head.
export const cameraCapabilities = {
  sensor: "imx708_wide",
  max_width: 4608,
  max_height: 2592,
  max_gain: 16.0,
  max_exposure_us: 120000,
  max_zoom: 4.0,
  exposure_modes: ["normal", "short", "long"],
  constraint_modes: ["normal", "highlight", "shadows"],
  af_modes: ["manual", "auto", "continuous"]
} as const;
