import type { GitlabGroupPayload, GitlabMemberPayload } from '../gitlab/types';
import { PayloadReader } from './payloadReader';

export const ACCESS_LEVELS: Readonly<Record<number, string>> = {
  0: 'No Access',
  5: 'Minimal Access',
  10: 'Guest',
  20: 'Reporter',
  30: 'Developer',
  40: 'Maintainer',
  50: 'Owner',
};

export interface GroupMember {
  id: number;
  username: string;
  name: string;
  accessLevel: number;
  accessLevelDescription: string;
  state: string;
  membershipState: string;
}

/**
 * A GitLab group. `members` stays `null` until members are explicitly fetched.
 */
export interface Group {
  id: number;
  name: string;
  fullPath: string;
  parentId: number | null;
  members: GroupMember[] | null;
}

export function describeAccessLevel(level: number): string {
  return ACCESS_LEVELS[level] ?? 'Unknown';
}

export function parseGroup(raw: unknown): Group {
  const reader = new PayloadReader<GitlabGroupPayload>('group', raw);
  return {
    id: reader.number('id'),
    name: reader.string('name'),
    fullPath: reader.string('full_path'),
    parentId: reader.optionalNumber('parent_id'),
    members: null,
  };
}

export function parseGroupMember(raw: unknown): GroupMember {
  const reader = new PayloadReader<GitlabMemberPayload>('group member', raw);
  const accessLevel = reader.optionalNumber('access_level') ?? 0;
  return {
    id: reader.number('id'),
    username: reader.string('username'),
    name: reader.stringOr('name', ''),
    accessLevel,
    accessLevelDescription: describeAccessLevel(accessLevel),
    state: reader.stringOr('state', 'active'),
    membershipState: reader.stringOr('membership_state', 'active'),
  };
}
