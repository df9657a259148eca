// ============================================================================
// INTERACTIVE COMMANDS
// ============================================================================
// Line handling for the interactive front end. Anything that is not a
// system command is submitted as a query to the current session.
// ============================================================================

import type { StockAgentSystem } from '../orchestrator/stock-agent-system';
import type { TurnResult } from '../types';

export const HELP_TEXT = `
AVAILABLE COMMANDS:

Query Commands:
  - Any stock-related question (e.g. "Get price for AAPL")
  - "Analyze TSLA comprehensively"
  - "Compare AAPL, MSFT, GOOGL"
  - "Portfolio analysis: AAPL, MSFT, GOOGL, TSLA"

System Commands:
  help     - Show this help message
  status   - Show system information
  tools    - List the available tools
  test     - Run a test query
  history  - Show query history
  clear    - Clear session history
  quit     - Exit the application

Press Ctrl+C while a query runs to cancel it.
`;

export type CommandOutcome = 'continue' | 'quit';

export interface CommandContext {
  system: StockAgentSystem;
  sessionId: string;
  print: (text: string) => void;
  signal?: AbortSignal;
}

export function formatTurnResult(result: TurnResult): string {
  if (!result.ok) {
    return `Error (${result.error.kind}): ${result.error.message}`;
  }

  const { response } = result;
  const lines = [
    'RESULT:',
    '-'.repeat(30),
    response.text,
    '',
    `Workers: ${response.contributingWorkers.join(', ')}${response.escalated ? ' (escalated)' : ''}`,
  ];
  if (response.warnings.length > 0) {
    lines.push('Warnings:', ...response.warnings.map((w) => `  - ${w}`));
  }
  return lines.join('\n');
}

export async function handleLine(line: string, ctx: CommandContext): Promise<CommandOutcome> {
  const input = line.trim();
  if (input.length === 0) return 'continue';

  const { system, sessionId, print } = ctx;

  switch (input.toLowerCase()) {
    case 'quit':
    case 'exit':
    case 'q':
      print('Goodbye!');
      return 'quit';

    case 'help':
      print(HELP_TEXT);
      return 'continue';

    case 'status': {
      const status = system.getSystemStatus();
      const capabilities = system.getAgentCapabilities();
      print(
        [
          'SYSTEM INFORMATION:',
          `Model: ${status.config.model}`,
          `Providers: ${status.providers.join(' → ') || 'none'}`,
          `Tools Available: ${status.tools}`,
          `Session History: ${system.getSessionHistory(sessionId)?.length ?? 0} queries`,
          '',
          'AGENT CAPABILITIES:',
          ...Object.entries(capabilities).flatMap(([agent, caps]) => [
            `${agent.toUpperCase()}:`,
            ...caps.map((c) => `  - ${c}`),
          ]),
        ].join('\n'),
      );
      return 'continue';
    }

    case 'tools':
      print(system.getAvailableTools().map((t) => `  - ${t.name}: ${t.description}`).join('\n'));
      return 'continue';

    case 'test': {
      const { testQuery, result, systemWorking } = await system.testSystem();
      print(`Test query: ${testQuery}\n${systemWorking ? 'SUCCESS' : 'FAILED'}\n${formatTurnResult(result)}`);
      return 'continue';
    }

    case 'history': {
      const history = system.getSessionHistory(sessionId) ?? [];
      if (history.length === 0) {
        print('No queries in history');
        return 'continue';
      }
      print(
        [
          `QUERY HISTORY (${history.length} queries):`,
          ...history.map(
            (turn, i) =>
              `${i + 1}. ${turn.query}\n   ${turn.response.complexity} → ${turn.response.contributingWorkers.join(', ')}`,
          ),
        ].join('\n'),
      );
      return 'continue';
    }

    case 'clear':
      system.clearSessionHistory(sessionId);
      print('Session history cleared');
      return 'continue';

    default: {
      const result = await system.submitQuery(input, sessionId, { signal: ctx.signal });
      print(formatTurnResult(result));
      return 'continue';
    }
  }
}
