export { HeaderList } from "~/response/headers.ts";
export {
  type ChunkSource,
  HTML_CONTENT_TYPE,
  JSON_CONTENT_TYPE,
  OCTET_CONTENT_TYPE,
  Reply,
  type ReplyBody,
  type ReplyInit,
  TEXT_CONTENT_TYPE,
} from "~/response/reply.ts";
export {
  fromReadableStream,
  fromWebResponse,
  toChunk,
  toOwnedReply,
  toReply,
} from "~/response/convert.ts";
export {
  assemble,
  type AssembledResponse,
  type AssembleOptions,
  type ChunkSink,
  pump,
  toWebResponse,
} from "~/response/assemble.ts";
