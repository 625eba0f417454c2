import { id } from "tsafe";

/** Process-wide sink the trace records are written to. */
export type DiagnosticStream = {
    write: (record: string) => void;
};

const consoleStream: DiagnosticStream = {
    write: record => console.log(record)
};

const globalContext = {
    stdlog: id<DiagnosticStream>(consoleStream)
};

export function getStdlog(): DiagnosticStream {
    return globalContext.stdlog;
}

/** Redirects the diagnostic stream, returns the stream that was in place. */
export function setStdlog(stream: DiagnosticStream): DiagnosticStream {
    const stream_previous = globalContext.stdlog;

    globalContext.stdlog = stream;

    return stream_previous;
}
