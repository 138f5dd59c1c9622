import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import type { Tokenizer } from '../../application/providers/Tokenizer';

export class TiktokenTokenizer implements Tokenizer {
    private encoding: Tiktoken;

    constructor(encodingName: TiktokenEncoding = 'cl100k_base') {
        this.encoding = getEncoding(encodingName);
    }

    encode(text: string): number[] {
        // Special-token markers in documents are ordinary text
        return this.encoding.encode(text, [], []);
    }

    decode(tokens: number[]): string {
        return this.encoding.decode(tokens);
    }
}
