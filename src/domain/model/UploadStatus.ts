export const UploadStatus = {
  CREATED: 'CREATED',
  PREVIEWED: 'PREVIEWED',
  UPLOADING: 'UPLOADING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type UploadStatus = (typeof UploadStatus)[keyof typeof UploadStatus];

const VALID_TRANSITIONS: Record<UploadStatus, readonly UploadStatus[]> = {
  [UploadStatus.CREATED]: [UploadStatus.PREVIEWED, UploadStatus.UPLOADING],
  [UploadStatus.PREVIEWED]: [UploadStatus.PREVIEWED, UploadStatus.UPLOADING],
  [UploadStatus.UPLOADING]: [UploadStatus.COMPLETED, UploadStatus.FAILED],
  [UploadStatus.COMPLETED]: [],
  [UploadStatus.FAILED]: [],
};

export function canTransition(from: UploadStatus, to: UploadStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
