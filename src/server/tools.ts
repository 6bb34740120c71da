import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ShellsenseConfig } from '../config/types.js';
import type { ClassificationService } from '../classifier/service.js';
import type { DecisionLog } from '../logging/decision-log.js';
import { computeStats, formatStatsTable } from '../logging/stats.js';
import { classificationRequestSchema, handleClassificationRequest } from './boundary.js';

export interface ToolDeps {
  config: ShellsenseConfig;
  service: ClassificationService;
  decisionLog: DecisionLog;
}

function jsonContent(value: unknown): { content: Array<{ type: 'text'; text: string }> } {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  };
}

export function registerTools(server: McpServer, deps: ToolDeps): void {
  const { config, service, decisionLog } = deps;
  const request = classificationRequestSchema.shape;

  // Tool 1: classify_input - the boundary contract over MCP
  server.tool(
    'classify_input',
    'Decide whether a line of input is a shell command to execute or a natural-language prompt for an agent. Returns classification, confidence, reasoning and pattern metadata.',
    {
      input: request.input
        .describe('The raw line of input to classify'),

      context: request.context
        .describe('Prior-session context ({ session_id, history }). Accepted but does not change the result yet.'),
    },
    async ({ input, context }) => {
      const result = await handleClassificationRequest({ input, context }, service);
      return jsonContent(result);
    },
  );

  // Tool 2: get_classifier_status - which path is active
  server.tool(
    'get_classifier_status',
    'Show whether classification runs on the zero-shot model or on heuristics only, and which model is configured.',
    {},
    async () => {
      await service.initialize();
      return jsonContent({
        mode: service.mode,
        model: {
          provider: config.model.provider,
          name: service.modelName ?? config.model.name,
          enabled: config.model.enabled,
        },
      });
    },
  );

  // Tool 3: get_classification_stats - aggregate over recent decisions
  server.tool(
    'get_classification_stats',
    'Get aggregate statistics over recent classification decisions: shell/prompt split, model vs heuristic usage, fallback rate, average confidence and latency.',
    {
      limit: z.number().int().positive().optional()
        .describe('Only consider the most recent N decisions (default: all retained)'),

      format: z.enum(['json', 'table']).optional().default('json')
        .describe('json for structured stats, table for a plain-text summary'),
    },
    async ({ limit, format }) => {
      const stats = computeStats(decisionLog.tail(limit ?? decisionLog.size));
      if (format === 'table') {
        return { content: [{ type: 'text' as const, text: formatStatsTable(stats) }] };
      }
      return jsonContent(stats);
    },
  );

  // Tool 4: get_recent_classifications - inspect recent decisions
  server.tool(
    'get_recent_classifications',
    'View the most recent classification decisions. Inputs are stored as hashes only.',
    {
      limit: z.number().int().positive().optional().default(10)
        .describe('Number of recent entries to return'),
    },
    async ({ limit }) => {
      const entries = decisionLog.tail(limit);
      return jsonContent({ entries, count: entries.length });
    },
  );
}
