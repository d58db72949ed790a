import React from "react";
import { render } from "ink";
import App from "./App";
import { InteractiveView } from "./view";

export interface TerminalSession {
  /** Settles when the render loop stops. */
  readonly done: Promise<void>;
  /** Stops the render loop and hands the terminal back. Safe to call more than once. */
  close(): void;
}

/**
 * Takes over the terminal for the live view. The session must be closed on
 * every exit path; a process exit hook closes it as a last resort.
 */
export function openTerminalSession(view: InteractiveView): TerminalSession {
  const controller = new AbortController();
  const instance = render(<App view={view} />, {
    exitOnCtrlC: false,
    patchConsole: false,
  });
  const done = view.run(controller.signal);

  let closed = false;
  const close = () => {
    if (closed) return;
    closed = true;
    process.removeListener("exit", close);
    controller.abort();
    instance.unmount();
    instance.cleanup();
    view.dispose();
  };
  process.once("exit", close);

  return { done, close };
}
