/**
 * AI SDK oracle client
 *
 * Real OracleClient backed by `generateText` with structured output.
 * Retries are left to GovernedOracle, so SDK-internal retries are off.
 *
 * @module briefing/oracle-client
 */

import { generateText, Output } from "ai";
import type { BriefingConfig } from "../config-schemas";
import { toOracleError } from "../error-classification";
import { getModelForTask, resolveModelNameForTask } from "./llm";
import {
  validateOracleOutput,
  type OracleClient,
  type OracleCompletion,
  type OracleRequest,
  type OracleTask,
} from "./oracle";

const TASK_TEMPERATURE: Record<OracleTask, number> = {
  extraction: 0.1,
  topic_normalization: 0,
  contestation: 0.1,
  synthesis: 0.3,
  publisher_resolution: 0,
};

export class AiSdkOracleClient implements OracleClient {
  constructor(private readonly config: BriefingConfig) {}

  modelNameFor(task: OracleTask): string {
    return resolveModelNameForTask(task, this.config);
  }

  async complete<T>(request: OracleRequest<T>): Promise<OracleCompletion<T>> {
    const model = getModelForTask(request.task, this.config);

    let raw: unknown;
    let tokensIn = 0;
    let tokensOut = 0;
    try {
      const result = await generateText({
        model: model.model,
        system: request.system,
        prompt: request.prompt,
        temperature: TASK_TEMPERATURE[request.task],
        maxOutputTokens: request.maxOutputTokens,
        maxRetries: 0,
        abortSignal: request.signal,
        experimental_output: Output.object({ schema: request.schema }),
      });
      tokensIn = result.usage.inputTokens ?? 0;
      tokensOut = result.usage.outputTokens ?? 0;
      raw = result.experimental_output;
    } catch (err) {
      throw toOracleError(err);
    }

    return {
      output: validateOracleOutput(request.schema, raw),
      tokensIn,
      tokensOut,
      modelName: model.modelName,
    };
  }
}
