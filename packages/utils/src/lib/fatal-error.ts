//
// An error that should be reported to the user without stack traces or technical details,
// such as input that can't be used as a key.
//
export class FatalError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FatalError';
    }
}
