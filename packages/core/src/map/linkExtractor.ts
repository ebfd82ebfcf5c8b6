// Link extraction
// - <child xsi:type="link"> → MapLink once both ID1/ID2 endpoints exist
// - unresolved endpoints defer the link (pending) instead of failing

import { XSI_TYPE_ATTRIBUTE } from "./classify.js";
import { parseInteger, readElementId, readLabel } from "./elementValues.js";
import { MapStructureError } from "./errors.js";
import {
  resolveEndpoint,
  type EndpointKind,
  type EndpointRef,
  type ExtractionContext,
  type LinkDirection,
  type MapLink,
  type PendingLink,
} from "./types.js";
import { findChild, type MapXmlElement } from "./xmlTree.js";

const ARROW_STATE_NONE = 0;
const ARROW_STATE_FIRST_ENDPOINT = 1;
const ARROW_STATE_BOTH = 3;

export type LinkResolution = "resolved" | "deferred";

function readEndpointKind(tag: MapXmlElement, linkId: number): EndpointKind {
  const kind = tag.attributes[XSI_TYPE_ATTRIBUTE];
  if (kind === "node" || kind === "link") return kind;
  throw new MapStructureError(
    `Link ${linkId} has <${tag.tag}> with unsupported ${XSI_TYPE_ATTRIBUTE}="${kind ?? ""}"`,
  );
}

function readEndpointRef(element: MapXmlElement, tagName: string, linkId: number): EndpointRef {
  const tag = findChild(element, tagName);
  if (!tag) {
    throw new MapStructureError(`Link ${linkId} is missing its <${tagName}> endpoint`);
  }
  return {
    kind: readEndpointKind(tag, linkId),
    id: parseInteger(tag.text, `<${tagName}> endpoint ID of link ${linkId}`),
  };
}

export function parseLinkElement(element: MapXmlElement): PendingLink {
  const id = readElementId(element);
  const rawArrowState = element.attributes["arrowState"];

  return {
    id,
    label: readLabel(element),
    arrowState:
      rawArrowState === undefined
        ? ARROW_STATE_NONE
        : parseInteger(rawArrowState, `arrowState of link ${id}`),
    references: [readEndpointRef(element, "ID1", id), readEndpointRef(element, "ID2", id)],
    element,
  };
}

export function linkDirection(arrowState: number): LinkDirection {
  if (arrowState === ARROW_STATE_BOTH) return "bidirectional";
  if (arrowState === ARROW_STATE_NONE) return "undirected";
  return "directed";
}

export function extractLink(link: PendingLink, context: ExtractionContext): LinkResolution {
  const [first, second] = link.references;
  const firstEntity = resolveEndpoint(context, first);
  const secondEntity = resolveEndpoint(context, second);

  if (!firstEntity || !secondEntity) {
    context.pending.set(link.id, link);
    return "deferred";
  }

  // Arrow pointing at ID1 means ID1 is the head
  const reversed = link.arrowState === ARROW_STATE_FIRST_ENDPOINT;
  const record: MapLink = {
    id: link.id,
    label: link.label,
    start: reversed ? second : first,
    end: reversed ? first : second,
    directed: linkDirection(link.arrowState),
    type: `Link: ${firstEntity.type}-${secondEntity.type}`,
  };

  context.links.set(link.id, record);
  context.pending.delete(link.id);
  return "resolved";
}
