/**
 * JSON shapes served by a SysML v2 REST model server.
 * Only the properties this tool reads are typed; everything else passes through.
 */

/** Reference to another element, e.g. an entry of `ownedMember`. */
export interface ElementRef {
  "@id": string;
  [key: string]: unknown;
}

export interface Element {
  "@id": string;
  "@type"?: string;
  name?: string | null;
  declaredName?: string | null;
  shortName?: string | null;
  qualifiedName?: string | null;
  ownedMember?: ElementRef[];
  ownedFeature?: ElementRef[];
  [key: string]: unknown;
}

export interface ProjectUsage {
  usedProject?: { "@id"?: string; name?: string } | null;
  usedCommit?: { "@id"?: string } | null;
  [key: string]: unknown;
}

export interface Project {
  "@id": string;
  name?: string;
  description?: string | null;
  created?: string;
  defaultBranch?: { "@id": string } | null;
  projectUsages?: ProjectUsage | ProjectUsage[] | null;
  [key: string]: unknown;
}

export interface Commit {
  "@id": string;
  name?: string;
  created?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface Branch {
  "@id": string;
  name?: string;
  head?: { "@id": string } | null;
  [key: string]: unknown;
}
