/**
 * Shared types and interfaces for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';

export interface AgentContext {
  /** Row position of the entity being processed, when run inside a batch. */
  jobIndex?: number;
  entityName?: string;
  timestamp: Date;
}

export type AgentResult<T> =
  | { success: true; data: T; duration: number; context: AgentContext }
  | { success: false; error: string; duration: number; context: AgentContext };

export interface AgentConfig {
  name: string;
  description: string;
  version: string;
}

export interface Agent<TInput, TOutput> {
  config: AgentConfig;
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;
  execute(input: TInput, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>>;
}

export type AgentLogLevel = 'debug' | 'info' | 'warn' | 'error';
