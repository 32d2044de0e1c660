export { StaticFileResolver } from "./fileResolver";
export { DEFAULT_DOCUMENT, extractCandidatePath, toHttpMethod } from "./pathExtractor";
export { percentDecode } from "./percentDecoder";
export { isSafePath, pathComponents, type PathComponent } from "./safePath";
export type { HttpMethod, RejectionError, RequestView, ResolutionOutcome } from "./types";
