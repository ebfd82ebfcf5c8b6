// Map extraction errors
// - structural/document errors abort extraction, only endpoint resolution is retried

export class MapDocumentError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MapDocumentError";
  }
}

export class MapStructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MapStructureError";
  }
}

export class UnknownMetadataKindError extends Error {
  readonly nodeId: number;
  readonly kind: string | undefined;

  constructor(nodeId: number, kind: string | undefined) {
    super(`Invalid tag attribute on md of node ${nodeId}: t="${kind ?? ""}"`);
    this.name = "UnknownMetadataKindError";
    this.nodeId = nodeId;
    this.kind = kind;
  }
}

export class UnresolvedLinksError extends Error {
  readonly linkIds: number[];

  constructor(linkIds: number[]) {
    super(`Unresolved link endpoints after retry fixed point: ${linkIds.join(", ")}`);
    this.name = "UnresolvedLinksError";
    this.linkIds = linkIds;
  }
}
