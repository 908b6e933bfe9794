import 'reflect-metadata';
import { Newable } from 'inversify';
import { provide } from '@inversifyjs/binding-decorators';

/**
 * Metadata keys used only on the server side.
 */
export const ROUTING_METADATA_KEYS = {
    CONTROLLER: 'quickstart:controller',
    SOURCE_FILEPATH: 'quickstart:source-filepath',
};

/**
 * Marks a class as a controller.
 */
export function Controller(): ClassDecorator {
    return (target: object) => {
        Reflect.defineMetadata(ROUTING_METADATA_KEYS.CONTROLLER, true, target);
    };
}

export function isController(controllerClass: object): boolean {
    return Reflect.getMetadata(ROUTING_METADATA_KEYS.CONTROLLER, controllerClass) === true;
}

/**
 * Declares the controller's source path, which filter globs are matched against.
 * Without it the matcher falls back to `**\/<ClassName>.ts`.
 *
 * ```typescript
 * @SourceFile('src/controllers/secure/ProfileController.ts')
 * @provideSingleton()
 * @Controller()
 * export class ProfileController extends ProfileApiPrototype implements ProfileApi
 * ```
 */
export function SourceFile(filepath: string): ClassDecorator {
    return (target: object) => {
        Reflect.defineMetadata(ROUTING_METADATA_KEYS.SOURCE_FILEPATH, filepath, target);
    };
}

export function getSourceFile(controllerClass: object): string | undefined {
    const filepath: unknown = Reflect.getMetadata(ROUTING_METADATA_KEYS.SOURCE_FILEPATH, controllerClass);
    return typeof filepath === 'string' ? filepath : undefined;
}

/**
 * Binds the decorated class to itself in singleton scope, picked up by
 * buildProviderModule() when the server loads its containers.
 */
export function provideSingleton() {
    return (target: Newable<object>): void => {
        provide(target, (bind) => bind.inSingletonScope())(target);
    };
}
