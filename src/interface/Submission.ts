export interface StudentCredentials {
    /** Primary student email */
    email: string;

    /** Shared secret issued with the quiz */
    secret: string;
}

/** Inbound request that starts a chain */
export interface SolveRequest extends StudentCredentials {
    url: string;
}

export interface SubmissionPayload extends StudentCredentials {
    url: string;
    answer: string | number | boolean;
}

export interface SubmissionVerdict {
    correct: boolean;
    url?: string;
    reason?: string;
}
