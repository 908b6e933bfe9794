import { AsyncLocalStorage } from 'async_hooks';
import { Header } from '@oidc-quickstart/core-util';

/**
 * Per-request storage backing one RequestContext.run() call.
 */
export class ContextStore {
    readonly headers = new Map<string, string>();
}

/**
 * Typed key into the request context.
 *
 * Each key owns its values, so reading a key always yields the type it was
 * declared with:
 * ```typescript
 * const USER = new ContextKey<ClaimsPrincipal>('USER');
 * RequestContext.put(USER, principal);
 * const user = RequestContext.get(USER); // ClaimsPrincipal | undefined
 * ```
 */
export class ContextKey<T> {
    private readonly values = new WeakMap<ContextStore, T>();

    constructor(readonly name: string) {}

    /** @internal */
    read(store: ContextStore): T | undefined {
        return this.values.get(store);
    }

    /** @internal */
    write(store: ContextStore, value: T): void {
        this.values.set(store, value);
    }

    /** @internal */
    contains(store: ContextStore): boolean {
        return this.values.has(store);
    }

    /** @internal */
    erase(store: ContextStore): void {
        this.values.delete(store);
    }

    toString(): string {
        return `ContextKey(${this.name})`;
    }
}

/**
 * Request-scoped storage using AsyncLocalStorage.
 *
 * Values put in the context stay visible across every await of the request
 * that opened it, the way an MDC does for a thread.
 */
class RequestContextImpl {
    private storage = new AsyncLocalStorage<ContextStore>();

    /**
     * Run a function with a fresh context.
     * Called once per request by the Express wrapper, and by tests.
     */
    run<T>(fn: () => T): T {
        return this.storage.run(new ContextStore(), fn);
    }

    /**
     * True inside a RequestContext.run() block.
     */
    isActive(): boolean {
        return this.storage.getStore() !== undefined;
    }

    put<T>(key: ContextKey<T>, value: T): void {
        key.write(this.requireStore(), value);
    }

    get<T>(key: ContextKey<T>): T | undefined {
        const store = this.storage.getStore();
        return store ? key.read(store) : undefined;
    }

    has<T>(key: ContextKey<T>): boolean {
        const store = this.storage.getStore();
        return store ? key.contains(store) : false;
    }

    remove<T>(key: ContextKey<T>): void {
        const store = this.storage.getStore();
        if (store) {
            key.erase(store);
        }
    }

    /**
     * Store a platform header value.
     * Headers live apart from keyed values and are looked up by header name.
     */
    putHeader(header: Header, value: string): void {
        this.requireStore().headers.set(header.getHeaderName(), value);
    }

    getHeader(header: Header): string | undefined {
        return this.storage.getStore()?.headers.get(header.getHeaderName());
    }

    hasHeader(header: Header): boolean {
        return this.storage.getStore()?.headers.has(header.getHeaderName()) ?? false;
    }

    /**
     * Copy of every header in the current context, keyed by header name.
     */
    getAllHeaders(): Map<string, string> {
        const store = this.storage.getStore();
        return store ? new Map(store.headers) : new Map<string, string>();
    }

    private requireStore(): ContextStore {
        const store = this.storage.getStore();
        if (!store) {
            throw new Error('No context available. Did you call RequestContext.run() first?');
        }
        return store;
    }
}

/**
 * Global singleton instance of RequestContext.
 */
export const RequestContext = new RequestContextImpl();
