/**
 * A server-rendered page, resolved from a render scope so it can inject the
 * scope's TokenProvider and the application's services.
 */
export abstract class PageComponent {
    abstract readonly title: string;

    abstract render(): Promise<string>;
}
