export type StatusLevel = "info" | "warning" | "error";

export interface StatusEvent {
  level: StatusLevel;
  message: string;
  done: boolean;
}

export type StatusSink = (event: StatusEvent) => void | Promise<void>;
