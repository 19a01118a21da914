/**
 * NATS-style subject matching: tokens are separated by '.', '*' matches
 * exactly one token and a trailing '>' matches one or more tokens.
 */
export function subjectMatches(pattern: string, subject: string): boolean {
    const patternTokens = pattern.split('.');
    const subjectTokens = subject.split('.');

    for (let i = 0; i < patternTokens.length; i++) {
        const token = patternTokens[i];
        if (token === '>') {
            return i === patternTokens.length - 1 && subjectTokens.length > i;
        }
        if (i >= subjectTokens.length) {
            return false;
        }
        if (token !== '*' && token !== subjectTokens[i]) {
            return false;
        }
    }

    return patternTokens.length === subjectTokens.length;
}
