export type TranscriptionTask = "transcribe" | "translate";

export interface TranscriptionRequest {
  /** A complete WAV file. */
  audio: Buffer;
  language?: string;
  task: TranscriptionTask;
  prompt?: string;
}

export interface TranscribedPiece {
  text: string;
  noSpeechProbability: number;
}

export interface TranscriberPort {
  transcribe(request: TranscriptionRequest): Promise<TranscribedPiece[]>;
}
