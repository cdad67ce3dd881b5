// ============================================================================
// Subsystem Registry — column naming conventions → descriptors
// ============================================================================
import type { LinkGroup, LinkKind, SubsystemDescriptor, SubsystemGroup } from '@missionreplay/shared';
import { UnknownFieldError } from '../errors.js';

const LINK_PATTERN = /^COMM_(.+)_dB$/i;
const MARGIN_SUFFIX = /_Margin$/i;
const PREFIX_PATTERN = /^([A-Za-z0-9]+)_/;
const LINK_KINDS: Exclude<LinkKind, 'Unknown'>[] = ['GEO', 'LEO', 'UHF'];

export function inferLinkKind(linkId: string): LinkKind {
  const upper = linkId.toUpperCase();
  return LINK_KINDS.find(k => upper.includes(k)) ?? 'Unknown';
}

/** Link name for a `COMM_<NAME>[_Margin]_dB` column, or null for any other column. */
export function linkIdFor(column: string): string | null {
  const match = LINK_PATTERN.exec(column);
  if (!match) return null;
  const name = match[1].replace(MARGIN_SUFFIX, '');
  return (name || match[1]).toUpperCase();
}

function byId(a: { id: string }, b: { id: string }): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Classifies every column into exactly one descriptor. Pure: the same set of
 * names always produces the same list, sorted by id with sorted fields.
 */
export function classifyColumns(columns: Iterable<string>): SubsystemDescriptor[] {
  const links = new Map<string, string[]>();
  const groups = new Map<string, string[]>();

  for (const column of new Set(columns)) {
    const linkId = linkIdFor(column);
    if (linkId) {
      const fields = links.get(linkId) ?? [];
      fields.push(column);
      links.set(linkId, fields);
      continue;
    }
    const prefix = PREFIX_PATTERN.exec(column);
    const id = prefix ? prefix[1].toUpperCase() : column;
    const fields = groups.get(id) ?? [];
    fields.push(column);
    groups.set(id, fields);
  }

  const descriptors: SubsystemDescriptor[] = [];

  for (const [id, fields] of groups) {
    const group: SubsystemGroup = {
      type: 'subsystem',
      id,
      category: id.startsWith('PL') ? 'payload' : 'subsystem',
      fields: [...fields].sort(),
    };
    descriptors.push(group);
  }

  for (const [linkId, fields] of links) {
    const sorted = [...fields].sort();
    const link: LinkGroup = {
      type: 'link',
      id: `COMM_${linkId}`,
      linkId,
      linkKind: inferLinkKind(linkId),
      marginField: sorted[0],
      fields: sorted,
    };
    descriptors.push(link);
  }

  return descriptors.sort(byId);
}

export class SubsystemRegistry {
  readonly descriptors: readonly SubsystemDescriptor[];
  private byField = new Map<string, SubsystemDescriptor>();

  constructor(columns: Iterable<string>) {
    this.descriptors = Object.freeze(classifyColumns(columns));
    for (const d of this.descriptors) {
      for (const f of d.fields) this.byField.set(f, d);
    }
  }

  /** Every non-link group, payloads included. */
  groups(): SubsystemGroup[] {
    return this.descriptors.filter((d): d is SubsystemGroup => d.type === 'subsystem');
  }

  subsystems(): SubsystemGroup[] {
    return this.descriptors.filter((d): d is SubsystemGroup => d.type === 'subsystem' && d.category === 'subsystem');
  }

  payloads(): SubsystemGroup[] {
    return this.descriptors.filter((d): d is SubsystemGroup => d.type === 'subsystem' && d.category === 'payload');
  }

  links(): LinkGroup[] {
    return this.descriptors.filter((d): d is LinkGroup => d.type === 'link');
  }

  /** Accepts either the link name (`LEO_SATCOM`) or its descriptor id (`COMM_LEO_SATCOM`), any case. */
  findLink(id: string): LinkGroup | undefined {
    const key = id.toUpperCase();
    return this.links().find(l => l.linkId === key || l.id.toUpperCase() === key);
  }

  link(id: string): LinkGroup {
    const link = this.findLink(id);
    if (!link) throw new UnknownFieldError('link', id);
    return link;
  }

  descriptorFor(field: string): SubsystemDescriptor | undefined {
    return this.byField.get(field);
  }

  fieldsOf(id: string): string[] {
    const d = this.descriptors.find(x => x.id === id);
    return d ? [...d.fields] : [];
  }
}
