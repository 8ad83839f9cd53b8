/** The parts of a plugin definition result processing reads. */
export type PluginDriver = "Job" | "DaemonSet";

export type ResultFormat = "junit" | "e2e" | "raw" | "manual" | "";

export type PluginDescriptor = {
  name: string;
  driver: PluginDriver;
  resultFormat: ResultFormat;
  /** Declared result files; empty means every file is a result. */
  resultFiles: string[];
};

/** On-disk shape of a plugin definition file. */
export type PluginFile = {
  "plugin-config": {
    "plugin-name": string;
    driver: PluginDriver;
    "result-format"?: ResultFormat;
    "result-files"?: string[];
  };
};
