export type DocumentType = "pdf" | "docx" | "txt" | "unknown";

export interface UploadedDocument {
  buffer: Buffer;
  fileName: string;
}
