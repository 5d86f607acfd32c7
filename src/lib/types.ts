export interface Attachment {
  name: string;
  mimeType: string;
  content: Buffer;
}

export interface TaskRequest {
  task: string;
  brief: string;
  nonce: string;
  email: string | null;
  round: number;
  attachments: Attachment[];
  evaluationUrl: string | null;
}

export type ArtifactKind = "html" | "css" | "js" | "readme" | "license" | "attachment";

export interface Artifact {
  path: string;
  kind: ArtifactKind;
  content: Buffer;
}

export type FileStatus = "created" | "updated";

export interface FileUploadStatus {
  path: string;
  kind: ArtifactKind;
  status: FileStatus;
  commitSha: string;
}

export interface ResultError {
  code: string;
  message: string;
  stage?: string;
  service?: string;
  upstreamStatus?: number;
}

export interface PublishResult {
  runId: string;
  success: boolean;
  task: string;
  nonce: string;
  round: number;
  email: string | null;
  repository: string | null;
  repoUrl: string | null;
  pagesUrl: string | null;
  branch: string;
  files: FileUploadStatus[];
  error: ResultError | null;
  finishedAt: string;
}

export interface RepositoryRef {
  owner: string;
  name: string;
  fullName: string;
  htmlUrl: string;
  defaultBranch: string;
  created: boolean;
}
