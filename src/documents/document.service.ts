import path from "node:path";
import { errorMessage, Logger } from "../config/logger";
import { UnsupportedFormatError } from "../shared/errors";
import { DocumentType } from "../shared/types/document.types";
import { extractDocxText } from "./extractors/docx.extractor";
import { extractPdfText } from "./extractors/pdf.extractor";
import { extractTxtText } from "./extractors/txt.extractor";

export class DocumentService {
  constructor(private readonly logger: Logger) {}

  detectDocumentType(fileName: string): DocumentType {
    const extension = path.extname(fileName).toLowerCase();
    if (extension === ".pdf") {
      return "pdf";
    }
    if (extension === ".docx") {
      return "docx";
    }
    if (extension === ".txt") {
      return "txt";
    }
    return "unknown";
  }

  /**
   * Never throws: an unsupported extension or a read failure is logged and yields "".
   * Line breaks are kept, section extraction depends on them.
   */
  async extractText(buffer: Buffer, fileName: string): Promise<string> {
    try {
      const text = await this.extractByType(buffer, fileName);
      const cleaned = text.replace(/\u0000/g, "");
      this.logger.info("Document text extracted", {
        fileName,
        chars: cleaned.length,
      });
      return cleaned;
    } catch (error) {
      this.logger.warn("Document text extraction failed", {
        fileName,
        code: error instanceof UnsupportedFormatError ? error.code : "read_failed",
        error: errorMessage(error),
      });
      return "";
    }
  }

  private async extractByType(buffer: Buffer, fileName: string): Promise<string> {
    const type = this.detectDocumentType(fileName);
    switch (type) {
      case "pdf":
        return extractPdfText(buffer);
      case "docx":
        return extractDocxText(buffer);
      case "txt":
        return extractTxtText(buffer);
      default:
        throw new UnsupportedFormatError(path.extname(fileName).toLowerCase());
    }
  }
}
