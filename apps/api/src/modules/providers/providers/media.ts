import type { MediaType } from "@wa-gateway/shared-types";

const MIME_BY_EXTENSION: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  webp: "image/webp",
  mp4: "video/mp4",
  "3gp": "video/3gpp",
  mov: "video/quicktime",
  mp3: "audio/mpeg",
  ogg: "audio/ogg",
  opus: "audio/ogg",
  m4a: "audio/mp4",
  aac: "audio/aac",
  pdf: "application/pdf",
  doc: "application/msword",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  xls: "application/vnd.ms-excel",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  txt: "text/plain",
};

const FALLBACK_MIME: Record<MediaType, string> = {
  image: "image/jpeg",
  video: "video/mp4",
  audio: "audio/mpeg",
  document: "application/octet-stream",
};

export function mimeTypeFor(filename: string, mediaType: MediaType): string {
  const dot = filename.lastIndexOf(".");
  const extension = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : "";
  return MIME_BY_EXTENSION[extension] ?? FALLBACK_MIME[mediaType];
}

export function toDataUrl(
  bytes: Buffer,
  filename: string,
  mediaType: MediaType,
): string {
  const mime = mimeTypeFor(filename, mediaType);
  return `data:${mime};name=${encodeURIComponent(filename)};base64,${bytes.toString("base64")}`;
}
