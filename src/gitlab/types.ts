/**
 * Raw payload shapes as GitLab's REST API returns them. Only the fields the toolbox reads are listed,
 * and every one is optional: models validate them on the way in.
 */

export interface GitlabGroupPayload {
  id?: number;
  name?: string;
  full_path?: string;
  parent_id?: number | null;
}

export interface GitlabMemberPayload {
  id?: number;
  username?: string;
  name?: string;
  access_level?: number;
  state?: string;
  membership_state?: string;
}

export interface GitlabProjectPayload {
  id?: number;
  name?: string;
  path?: string;
  path_with_namespace?: string;
  description?: string | null;
  visibility?: string;
  default_branch?: string | null;
  web_url?: string;
  namespace?: { full_path?: string };
  star_count?: number;
  forks_count?: number;
}

export interface GitlabMergeRequestPayload {
  id?: number;
  iid?: number;
  project_id?: number;
  title?: string;
  description?: string | null;
  state?: string;
  author?: { username?: string } | null;
  source_branch?: string;
  target_branch?: string;
  web_url?: string;
  created_at?: string;
  updated_at?: string;
  merged_at?: string | null;
  draft?: boolean;
  work_in_progress?: boolean;
}

export interface GitlabPipelinePayload {
  id?: number;
  iid?: number;
  project_id?: number;
  status?: string;
  source?: string;
  ref?: string;
  sha?: string;
  web_url?: string;
  created_at?: string;
  updated_at?: string;
  started_at?: string | null;
  finished_at?: string | null;
  duration?: number | null;
}

export interface GitlabJobPayload {
  id?: number;
  name?: string;
  stage?: string;
  status?: string;
  ref?: string;
  pipeline?: { id?: number } | null;
  created_at?: string;
  started_at?: string | null;
  finished_at?: string | null;
  duration?: number | null;
  web_url?: string;
}

export interface GitlabScheduleVariablePayload {
  key?: string;
  variable_type?: string;
  value?: string;
  raw?: boolean;
}

export interface GitlabSchedulePayload {
  id?: number;
  description?: string | null;
  ref?: string;
  cron?: string;
  cron_timezone?: string;
  next_run_at?: string | null;
  active?: boolean;
  created_at?: string;
  updated_at?: string;
  owner?: { username?: string } | null;
  last_pipeline?: { id?: number; sha?: string; ref?: string; status?: string } | null;
  variables?: GitlabScheduleVariablePayload[];
}

export interface GitlabMessagePayload {
  message?: string;
}
