/**
 * Research roles (planner, decomposer, evaluator, synthesizer, continuation judge,
 * citation engine) differ only in their prompt template and the shape they decode.
 * Each is described as data and run through the same gateway call.
 */

import { z } from 'zod';
import { LLMGateway } from './clients/llm.js';
import { Decoded, decodeReply } from './parsing.js';
import { errorMessage } from './errors.js';

export interface ResearchRole<I, S extends z.ZodTypeAny> {
  /** Log tag, e.g. "Planning" */
  tag: string;
  system: string;
  buildPrompt(input: I): string;
  schema: S;
  /** Deterministic value used when the reply cannot be decoded */
  fallback(input: I, rawReply: string): z.infer<S>;
}

export interface AskOptions {
  context?: Record<string, unknown>;
  /** Re-throw gateway failures instead of degrading to the fallback */
  rethrowGatewayErrors?: boolean;
}

export type RoleReply<T> = Decoded<T> & { raw: string };

export async function askRole<I, S extends z.ZodTypeAny>(
  gateway: LLMGateway,
  role: ResearchRole<I, S>,
  input: I,
  options: AskOptions = {}
): Promise<RoleReply<z.infer<S>>> {
  let raw: string;
  try {
    raw = await gateway.complete(role.system, role.buildPrompt(input), options.context);
  } catch (error) {
    if (options.rethrowGatewayErrors) throw error;
    const reason = `gateway call failed: ${errorMessage(error)}`;
    console.error(`[${role.tag}] ${reason}, using fallback`);
    return { status: 'degraded', value: role.fallback(input, ''), reason, raw: '' };
  }

  const decoded = decodeReply(raw, role.schema, () => role.fallback(input, raw));
  if (decoded.status === 'degraded') {
    console.error(`[${role.tag}] ${decoded.reason}, using fallback`);
  }
  return { ...decoded, raw };
}
