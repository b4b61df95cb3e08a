import type { GitlabProjectPayload } from '../gitlab/types';
import { PayloadReader } from './payloadReader';

export const PROJECT_VISIBILITIES = ['private', 'internal', 'public'] as const;
export type ProjectVisibility = (typeof PROJECT_VISIBILITIES)[number];

export interface Project {
  id: number;
  name: string;
  path: string;
  pathWithNamespace: string;
  description: string | null;
  visibility: ProjectVisibility | null;
  defaultBranch: string | null;
  webUrl: string | null;
  namespacePath: string;
  starCount: number;
  forksCount: number;
}

export function parseProject(raw: unknown): Project {
  const reader = new PayloadReader<GitlabProjectPayload>('project', raw);
  return {
    id: reader.number('id'),
    name: reader.string('name'),
    path: reader.stringOr('path', ''),
    pathWithNamespace: reader.string('path_with_namespace'),
    // GitLab sends an empty description for projects that never set one
    description: reader.optionalString('description') || null,
    visibility: reader.optionalOneOf('visibility', PROJECT_VISIBILITIES),
    defaultBranch: reader.optionalString('default_branch'),
    webUrl: reader.optionalString('web_url'),
    namespacePath: reader.nested('namespace')?.stringOr('full_path', '') ?? '',
    starCount: reader.optionalNumber('star_count') ?? 0,
    forksCount: reader.optionalNumber('forks_count') ?? 0,
  };
}
