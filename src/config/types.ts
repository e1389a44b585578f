import type { OutputFormat } from "../domain";

export type DurationString = string;

export interface RawTwilioConfig {
  account_sid?: string;
  auth_token?: string;
  sender?: string;
  receivers?: string[];
}

export interface RawPerfprobeFile {
  targets?: string[];
  delay?: DurationString;
  timeout?: DurationString;
  max_attempts?: number;
  failure_ceiling?: number;
  alert_threshold?: DurationString;
  alert_interval?: DurationString;
  output?: OutputFormat;
  location?: string;
  metrics?: {
    textfile?: string;
  };
  webhook?: {
    url?: string;
  };
  notify?: {
    twilio?: RawTwilioConfig;
  };
}
