export interface TTSRequest {
  text: string;
  voice?: string;
  language?: string;
}

export interface TTSResult {
  audio: Buffer;
  contentType: string;
}
