export interface SpeechSynthesisPort {
  /** Writes an MP3 rendering of `text` to `outputPath`, replacing any existing file. */
  synthesize(text: string, language: string, outputPath: string): Promise<void>;
}

/** Returns the decoded duration in seconds, or undefined when it cannot be read. */
export type AudioDurationProbe = (filePath: string) => Promise<number | undefined>;
