import { Logger } from "../config/logger";
import { DocumentService } from "../documents/document.service";
import { EmptyDocumentError, MissingInputError } from "../shared/errors";
import { UploadedDocument } from "../shared/types/document.types";
import { MatchResult } from "../shared/types/matching.types";
import { MatchingEngine } from "./matching.engine";

export interface MatchRequestInput {
  resume?: UploadedDocument;
  jobDescription?: string;
}

export class MatchRequestService {
  constructor(
    private readonly documentService: DocumentService,
    private readonly engine: MatchingEngine,
    private readonly logger: Logger,
  ) {}

  async handle(input: MatchRequestInput): Promise<MatchResult> {
    if (!input.resume) {
      throw new MissingInputError("No resume file provided");
    }
    if (!input.resume.fileName) {
      throw new MissingInputError("No file selected");
    }
    const jobDescription = (input.jobDescription ?? "").trim();
    if (!jobDescription) {
      throw new MissingInputError("Job description is required");
    }

    const resumeText = await this.documentService.extractText(
      input.resume.buffer,
      input.resume.fileName,
    );
    if (!resumeText.trim()) {
      this.logger.warn("Resume text is empty", { fileName: input.resume.fileName });
      throw new EmptyDocumentError();
    }

    return this.engine.match(resumeText, jobDescription);
  }
}
