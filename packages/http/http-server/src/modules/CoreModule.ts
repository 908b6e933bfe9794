import { ContainerModule } from 'inversify';
import { HEADER_TYPES, PlatformHeadersExtension, HeaderMethods } from '@oidc-quickstart/http-api';
import { CoreHeaders } from '../headers/CoreHeaders';
import { HtmlResultWriter, ResultWriter } from '../extensions/ResultWriter';
import { SERVER_TYPES } from '../extensions/ServerTypes';

/**
 * Framework bindings, loaded into the application container before any
 * module the application supplies.
 *
 * Extension points use multi-bindings: each module binds its own instance to
 * the shared symbol and consumers collect them all.
 */
export const CoreModule = new ContainerModule((options) => {
    const { bind } = options;

    bind<HeaderMethods>(HeaderMethods).toSelf().inSingletonScope();

    const coreExtension = new PlatformHeadersExtension(CoreHeaders.getAllHeaders());
    bind<PlatformHeadersExtension>(HEADER_TYPES.PlatformHeadersExtension).toConstantValue(coreExtension);

    bind<ResultWriter>(SERVER_TYPES.ResultWriter).toConstantValue(new HtmlResultWriter());

    console.log(`[CoreModule] Registered core platform headers extension with ${coreExtension.headers.length} headers`);
});
