// ============================================================================
// Mission Replay Subsystem Types
// ============================================================================

export type LinkKind = 'GEO' | 'LEO' | 'UHF' | 'Unknown';

export type SubsystemCategory = 'subsystem' | 'payload';

export interface SubsystemGroup {
  type: 'subsystem';
  id: string;
  category: SubsystemCategory;
  fields: string[];
}

export interface LinkGroup {
  type: 'link';
  id: string; // COMM_<LINK>
  linkId: string;
  linkKind: LinkKind;
  marginField: string;
  fields: string[];
}

export type SubsystemDescriptor = SubsystemGroup | LinkGroup;
