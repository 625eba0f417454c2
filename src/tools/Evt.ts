export type NonPostableEvt<T> = {
    subscribe: (next: (data: T) => void) => void;
};

export type Evt<T> = NonPostableEvt<T> & {
    post: (data: T) => void;
};

// NOTE: Listeners run synchronously, in subscription order, and an error
// thrown by one of them reaches the poster.
export function createEvt<T>(): Evt<T> {
    const listeners: ((data: T) => void)[] = [];

    return {
        subscribe: next => {
            listeners.push(next);
        },
        post: data => {
            for (const next of [...listeners]) {
                next(data);
            }
        }
    };
}
