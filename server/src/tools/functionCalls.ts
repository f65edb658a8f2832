import { decodeArguments, serializeFunctionResult } from "../core/activityListener.js";
import { errorMessage } from "../core/errors.js";
import { ActivityListener, AgentFunction } from "../core/types.js";

/**
 * Runs one declared function on behalf of an agent runtime and reports the
 * call and its result to the listener. Unknown names and thrown errors become
 * result text; the returned string is what the model sees.
 */
export async function callFunction(
  functions: readonly AgentFunction[],
  callId: string,
  name: string,
  rawArgs: unknown,
  listener: ActivityListener,
  signal: AbortSignal,
): Promise<string> {
  const args = decodeArguments(rawArgs);
  listener.functionCall(callId, name, args);

  const fn = functions.find((candidate) => candidate.name === name);
  let result: string;
  if (!fn) {
    result = JSON.stringify({ error: `Unknown function: ${name}` });
  } else {
    try {
      const value = await fn.execute(args, signal);
      result = serializeFunctionResult(value);
    } catch (error) {
      result = `Function ${name} failed: ${errorMessage(error)}`;
    }
  }

  listener.functionResult(callId, name, result);
  return result;
}
