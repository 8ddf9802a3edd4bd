import type { Command, CommandContext } from "./core.js";
import { dispatchCommand } from "./core.js";

export type DispatchCommand = <TResult>(
  command: Command<TResult>,
  context: CommandContext,
) => Promise<TResult>;

/**
 * Wrap a dispatcher so commands run one at a time in arrival order. The round
 * engine must never see two overlapping calls.
 */
export function createSerialDispatch(
  dispatch: DispatchCommand = dispatchCommand,
): DispatchCommand {
  let tail: Promise<unknown> = Promise.resolve();

  return <TResult>(command: Command<TResult>, context: CommandContext): Promise<TResult> => {
    const run = tail.then(() => dispatch(command, context));
    // The caller receives the rejection through `run`; the queue moves on.
    tail = run.catch(() => undefined);
    return run;
  };
}
