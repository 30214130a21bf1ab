export enum ExtractionStage {
  PARSING = "PARSING",
  STRUCTURING_PRIMARY = "STRUCTURING_PRIMARY",
  STRUCTURING_FALLBACK = "STRUCTURING_FALLBACK",
  DONE = "DONE",
}

// One source document inside a parent group
export interface WorkUnit {
  parentId: string;
  documentHandle: string;
  displayName: string;
}

export interface DocumentListing {
  handle: string;
  name: string;
  size?: number;
}

export interface ParentGroupListing {
  id: string;
  handle: string;
}

export interface ParseOptions {
  language: string;
}
