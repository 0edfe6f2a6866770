// Progress events for a research run.
// The CLI prints them to stderr so stdout carries only the report; --quiet drops them.

export type ProgressEvent = {
  type: "step" | "detail" | "done";
  message: string;
  step?: number;
  totalSteps?: number;
};

export type ProgressSink = (event: ProgressEvent) => void;

export interface Progress {
  step(step: number, totalSteps: number, message: string): void;
  detail(message: string): void;
  done(message: string): void;
}

export function createProgress(sink: ProgressSink): Progress {
  return {
    step: (step, totalSteps, message) => sink({ type: "step", step, totalSteps, message }),
    detail: (message) => sink({ type: "detail", message }),
    done: (message) => sink({ type: "done", message }),
  };
}

export const silentProgress: Progress = createProgress(() => {});

export function formatProgressEvent(event: ProgressEvent): string {
  if (event.type === "step" && event.step !== undefined && event.totalSteps !== undefined) {
    return `\n[${event.step}/${event.totalSteps}] ${event.message}`;
  }
  if (event.type === "detail") return `    ${event.message}`;
  return event.message;
}

/** Progress that writes to stderr, or nothing when quiet. */
export function consoleProgress(quiet: boolean): Progress {
  if (quiet) return silentProgress;
  return createProgress((event) => {
    process.stderr.write(`${formatProgressEvent(event)}\n`);
  });
}
