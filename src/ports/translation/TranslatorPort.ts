export interface TranslatorPort {
  translate(text: string): Promise<string>;
}
