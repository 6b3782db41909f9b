import type { AgentName } from '../types/agents.js';
import type { CompositeStatus, JobSnapshot, Report, ReportEntry } from '../types/orchestration.js';

const INSIGHT_PREVIEW_LENGTH = 200;

function toEntry(task: JobSnapshot['tasks'][number]): ReportEntry {
  if ((task.subStatus === 'SUCCEEDED' || task.subStatus === 'FALLBACK_USED') && task.result) {
    return {
      outcome: 'result',
      subStatus: task.subStatus,
      source: task.source ?? (task.subStatus === 'SUCCEEDED' ? 'LIVE' : 'FALLBACK'),
      result: task.result,
    };
  }

  return {
    outcome: 'failure',
    subStatus: task.subStatus === 'TIMED_OUT' ? 'TIMED_OUT' : 'FAILED',
    source: task.source,
    error: task.error ?? { code: 'AGENT_INTERNAL_ERROR', message: `Task settled as ${task.subStatus} without a result.` },
  };
}

export function compositeStatusFor(usable: number, requested: number): CompositeStatus {
  if (requested === 0 || usable === 0) {
    return 'FAILED';
  }
  return usable === requested ? 'COMPLETE' : 'PARTIAL';
}

function preview(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > INSIGHT_PREVIEW_LENGTH ? `${trimmed.slice(0, INSIGHT_PREVIEW_LENGTH)}...` : trimmed;
}

/**
 * Markdown digest of the report: one line per agent. Insight text is copied,
 * never merged across agents.
 */
export function buildSummary(
  query: string,
  compositeStatus: CompositeStatus,
  coverageRatio: number,
  agents: ReadonlyArray<[AgentName, ReportEntry]>,
): string {
  const lines = [
    `## Analysis Summary for '${query}'`,
    '',
    `Status: ${compositeStatus} (coverage ${Math.round(coverageRatio * 100)}%)`,
    '',
    '### Findings',
  ];

  for (const [agent, entry] of agents) {
    if (entry.outcome === 'result') {
      const insight = entry.result.insights ? preview(entry.result.insights) : 'No insight text.';
      lines.push(`- **${agent}** (${entry.result.source}, ${entry.result.confidence}): ${insight}`);
    } else {
      lines.push(`- **${agent}**: ${entry.subStatus} (${entry.error.code}) ${entry.error.message}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

/** Builds the final report for a settled job. Pure: reads the snapshot, writes nothing. */
export class ReportAggregator {
  aggregate(job: JobSnapshot, now = new Date()): Report {
    const entries: Array<[AgentName, ReportEntry]> = job.requestedAgents.map((agent) => {
      const task = job.tasks.find((candidate) => candidate.agent === agent);
      const entry: ReportEntry = task
        ? toEntry(task)
        : {
          outcome: 'failure',
          subStatus: 'FAILED',
          source: null,
          error: { code: 'AGENT_INTERNAL_ERROR', message: 'Task record is missing.' },
        };
      return [agent, entry];
    });

    const requested = entries.length;
    const succeeded = entries.filter(([, entry]) => entry.outcome === 'result').length;
    const coverageRatio = requested === 0 ? 0 : succeeded / requested;
    const compositeStatus = compositeStatusFor(succeeded, requested);

    return {
      jobId: job.id,
      query: job.query,
      compositeStatus,
      coverageRatio,
      requested,
      succeeded,
      failed: requested - succeeded,
      agents: Object.fromEntries(entries),
      summary: buildSummary(job.query, compositeStatus, coverageRatio, entries),
      generatedAt: now.toISOString(),
    };
  }
}
