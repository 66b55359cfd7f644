export {
	type AttachmentBatch,
	type AttachmentOptions,
	type AttachmentResult,
	countLines,
	DEFAULT_MAX_FILE_SIZE,
	extractFileReferences,
	type FileAttachment,
	type FileReferences,
	formatAttachment,
	readAttachment,
	resolveFileAttachments,
} from './file-attachments.js';
