/**
 * Base agent class providing common functionality for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { log as writeLog } from '@profilescout/core';
import type { Agent, AgentConfig, AgentContext, AgentResult, AgentLogLevel } from './types.js';

/**
 * Agents hold no per-run state, so one instance can serve many entities
 * concurrently. Log entries go to the shared ring buffer under the agent's name.
 */
export abstract class BaseAgent<TInput, TOutput> implements Agent<TInput, TOutput> {
  abstract config: AgentConfig;
  abstract inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  abstract outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  protected log(level: AgentLogLevel, message: string, data?: unknown): void {
    writeLog(this.config.name, level, message, data);
  }

  protected debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  protected info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  protected warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  protected error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /**
   * Validate input, run, validate output. Never rejects: failures come back
   * as `{ success: false, error }`.
   */
  async execute(input: TInput, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>> {
    const startTime = Date.now();

    const fullContext: AgentContext = {
      timestamp: new Date(),
      ...context,
    };

    this.debug('Starting execution', { entity: fullContext.entityName });

    try {
      const validatedInput = this.inputSchema.parse(input);
      const output = await this.run(validatedInput, fullContext);
      const validatedOutput = this.outputSchema.parse(output);

      const duration = Date.now() - startTime;
      this.debug('Completed successfully', { duration });

      return {
        success: true,
        data: validatedOutput,
        duration,
        context: fullContext,
      };
    } catch (err) {
      const duration = Date.now() - startTime;
      const errorMessage = err instanceof Error ? err.message : String(err);

      this.error(`Execution failed: ${errorMessage}`);

      return {
        success: false,
        error: errorMessage,
        duration,
        context: fullContext,
      };
    }
  }

  /**
   * Contains the core agent logic.
   */
  protected abstract run(input: TInput, context: AgentContext): Promise<TOutput>;
}
