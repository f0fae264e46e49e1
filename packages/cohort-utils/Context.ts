export interface Context {

}

export interface ContextNamespace<T> {
    get(context: Context): T;
    set(context: Context, value: T): Context;
}

export function createEmptyContext(): Context {
    return new ContextHolder({});
}

export function createContextNamespace<T>(name: string, defaultValue?: T): ContextNamespace<T> {
    return new ContextNamespaceHolder<T>(name, defaultValue);
}

class ContextHolder implements Context {
    readonly values: { [key: string]: unknown };

    constructor(values: { [key: string]: unknown }) {
        this.values = values;
    }
}

function unwrap(context: Context): ContextHolder {
    if (context instanceof ContextHolder) {
        return context;
    }
    throw Error('Unknown context implementation');
}

class ContextNamespaceHolder<T> implements ContextNamespace<T> {
    readonly name: string;
    readonly defaultValue: T | undefined;

    constructor(name: string, defaultValue?: T) {
        this.name = name;
        this.defaultValue = defaultValue;
    }

    get(context: Context): T {
        let raw = unwrap(context);
        if (this.name in raw.values && raw.values[this.name] !== undefined) {
            return raw.values[this.name] as T;
        }
        if (this.defaultValue === undefined) {
            throw Error('Context ' + this.name + ' is not set');
        }
        return this.defaultValue;
    }

    set(context: Context, value: T | undefined): Context {
        let raw = unwrap(context);
        let values = { ...raw.values };
        values[this.name] = value;
        return new ContextHolder(values);
    }
}

export const ContextName = createContextNamespace<string>('context-name', 'unnamed');

export function createNamedContext(name: string): Context {
    return ContextName.set(createEmptyContext(), name);
}
