export interface FileCreatedEvent {
    path: string;
    isDirectory: boolean;
}

export type UploadResult =
    | { ok: true }
    | { ok: false; reason: string };

export interface UploadClient {
    upload(filePath: string): Promise<UploadResult>;
}

export interface PipelineStats {
    uploaded: number;
    failed: number;
    vanished: number;
    errors: number;
}
