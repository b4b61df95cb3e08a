import type { MergeRequest } from '../models/mergeRequest';
import type { Pipeline } from '../models/pipeline';
import type { Project } from '../models/project';
import type { Schedule } from '../models/schedule';
import type { CellValue, RenderContext } from './types';
import { cellText, formatDuration } from './columns';
import { createPalette } from './table';

interface DetailBlock {
  title: string;
  subtitle?: string;
  fields: [string, CellValue][];
  trailer?: { label: string; lines: string[] };
}

const NOT_AVAILABLE = 'N/A';

function renderBlock(block: DetailBlock, context: RenderContext): string {
  const palette = createPalette(context);
  const labelWidth = block.fields.reduce((width, [label]) => Math.max(width, label.length + 1), 0);
  const lines = [palette.bold.cyan(block.title)];

  if (block.subtitle) {
    lines.push(palette.dim(block.subtitle));
  }
  lines.push('');

  block.fields.forEach(([label, value]) => {
    const text = cellText(value);
    lines.push(`${palette.bold(`${label}:`.padEnd(labelWidth))} ${text === '' ? NOT_AVAILABLE : text}`);
  });

  if (block.trailer) {
    lines.push('', palette.bold(`${block.trailer.label}:`), ...block.trailer.lines);
  }

  return lines.join('\n');
}

function renderBlocks<T>(items: readonly T[], toBlock: (item: T) => DetailBlock, context: RenderContext): string {
  return items.map(item => renderBlock(toBlock(item), context)).join('\n\n');
}

function projectBlock(project: Project): DetailBlock {
  return {
    title: project.name,
    subtitle: project.pathWithNamespace,
    fields: [
      ['ID', project.id],
      ['Description', project.description],
      ['Visibility', project.visibility],
      ['Default Branch', project.defaultBranch],
      ['Namespace', project.namespacePath || null],
      ['Stars', project.starCount],
      ['Forks', project.forksCount],
      ['URL', project.webUrl],
    ],
  };
}

function mergeRequestBlock(mr: MergeRequest): DetailBlock {
  return {
    title: `!${mr.iid} - ${mr.title}`,
    fields: [
      ['State', mr.state],
      ['Author', mr.author],
      ['Source Branch', mr.sourceBranch],
      ['Target Branch', mr.targetBranch],
      ['Draft', mr.draft],
      ['Pipeline', mr.latestPipelineStatus],
      ['Created', mr.createdAt],
      ['Updated', mr.updatedAt],
      ['Merged', mr.mergedAt],
      ['URL', mr.webUrl],
    ],
    trailer: { label: 'Description', lines: (mr.description ?? 'No description').split(/\r?\n/) },
  };
}

function pipelineBlock(pipeline: Pipeline): DetailBlock {
  return {
    title: `Pipeline #${pipeline.id}`,
    fields: [
      ['Status', pipeline.status],
      ['Source', pipeline.source],
      ['Ref', pipeline.ref],
      ['SHA', pipeline.sha],
      ['Created', pipeline.createdAt],
      ['Started', pipeline.startedAt],
      ['Finished', pipeline.finishedAt],
      ['Duration', formatDuration(pipeline.duration)],
      ['URL', pipeline.webUrl],
    ],
  };
}

function scheduleBlock(schedule: Schedule): DetailBlock {
  return {
    title: `Schedule #${schedule.id}${schedule.description ? ` - ${schedule.description}` : ''}`,
    fields: [
      ['Ref', schedule.ref],
      ['Cron', schedule.cron],
      ['Timezone', schedule.cronTimezone],
      ['Next Run', schedule.nextRunAt],
      ['Active', schedule.active],
      ['Owner', schedule.owner],
      ['Last Pipeline', schedule.lastPipeline?.id ?? null],
      ['Last Status', schedule.lastPipeline?.status ?? null],
      ['Created', schedule.createdAt],
      ['Updated', schedule.updatedAt],
    ],
    trailer:
      schedule.variables.length > 0
        ? {
            label: 'Variables',
            lines: schedule.variables.map(variable => `  ${variable.key}=${variable.value} (${variable.variableType})`),
          }
        : undefined,
  };
}

export function renderProjectDetails(projects: readonly Project[], context: RenderContext): string {
  return renderBlocks(projects, projectBlock, context);
}

export function renderMergeRequestDetails(mergeRequests: readonly MergeRequest[], context: RenderContext): string {
  return renderBlocks(mergeRequests, mergeRequestBlock, context);
}

export function renderPipelineDetails(pipelines: readonly Pipeline[], context: RenderContext): string {
  return renderBlocks(pipelines, pipelineBlock, context);
}

export function renderScheduleDetails(schedules: readonly Schedule[], context: RenderContext): string {
  return renderBlocks(schedules, scheduleBlock, context);
}
