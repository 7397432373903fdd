import { getEncoding, type Tiktoken } from "js-tiktoken";

export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

/** cl100k_base, the encoding of the OpenAI embedding models. */
export class TiktokenTokenizer implements Tokenizer {
  private encoding: Tiktoken;

  constructor(encoding: Parameters<typeof getEncoding>[0] = "cl100k_base") {
    this.encoding = getEncoding(encoding);
  }

  encode(text: string): number[] {
    return this.encoding.encode(text);
  }

  decode(tokens: number[]): string {
    return this.encoding.decode(tokens);
  }
}
