import { MutationType } from '../model/records.js';

export interface SequenceComparison {
    mutationType: MutationType;
    /** 1-based; absent when the sequences are identical. */
    position?: number;
    variants: string[];
}

/**
 * Position-by-position comparison of a sample against its reference.
 *
 * Equal lengths report every differing base as `<ref><pos><alt>`. A length
 * mismatch reports a single insertion (`ins<pos>`) or deletion (`del<pos>`)
 * at the first position where the two sequences diverge.
 */
export function compareSequences(reference: string, sample: string): SequenceComparison {
    const ref = reference.toUpperCase();
    const alt = sample.toUpperCase();

    if (ref === alt) {
        return { mutationType: 'none', variants: [] };
    }

    if (ref.length === alt.length) {
        const variants: string[] = [];
        let position: number | undefined;
        for (let i = 0; i < ref.length; i++) {
            if (ref[i] !== alt[i]) {
                if (position === undefined) {
                    position = i + 1;
                }
                variants.push(`${ref[i]}${i + 1}${alt[i]}`);
            }
        }
        return { mutationType: 'substitution', position, variants };
    }

    const shared = Math.min(ref.length, alt.length);
    let divergence = shared;
    for (let i = 0; i < shared; i++) {
        if (ref[i] !== alt[i]) {
            divergence = i;
            break;
        }
    }
    const position = divergence + 1;

    return alt.length > ref.length
        ? { mutationType: 'insertion', position, variants: [`ins${position}`] }
        : { mutationType: 'deletion', position, variants: [`del${position}`] };
}
