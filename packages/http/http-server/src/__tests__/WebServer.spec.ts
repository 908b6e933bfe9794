import { ContainerModule } from 'inversify';
import { RequestContext } from '@oidc-quickstart/core-context';
import {
    ApiInterface,
    Controller,
    FilterDefinition,
    Get,
    Path,
    Post,
    provideSingleton,
    RESTApiRoutes,
    RouteBuilder,
    Routes,
    ServerConfig,
    SourceFile,
    WebAppMeta,
} from '@oidc-quickstart/http-routing';
import { HtmlResult, HttpBadRequestError } from '@oidc-quickstart/http-api';
import { WebServerFactory } from '../WebServerFactory';
import { ContextFilter } from '../filters/ContextFilter';
import { LogApiFilter } from '../filters/LogApiFilter';
import { ServerContextKeys } from '../filters/ServerContextKeys';
import { CoreHeaders } from '../headers/CoreHeaders';
import { SERVER_TYPES } from '../extensions/ServerTypes';

class GreetingRequest {
    name?: string;
}

class GreetingResponse {
    message = '';
    requestId = '';
    requestUrl = '';
}

@ApiInterface()
abstract class GreetingApiPrototype {
    @Post()
    @Path('/greeting')
    greet(request: GreetingRequest): Promise<GreetingResponse> {
        throw new Error('Must be implemented');
    }

    @Get()
    @Path('/greeting/home')
    home(request: GreetingRequest): Promise<HtmlResult> {
        throw new Error('Must be implemented');
    }
}

const GREETING_PREFIX = Symbol.for('GreetingPrefix');

@SourceFile('src/controllers/GreetingController.ts')
@provideSingleton()
@Controller()
class GreetingController extends GreetingApiPrototype {
    async greet(request: GreetingRequest): Promise<GreetingResponse> {
        if (!request.name) {
            throw new HttpBadRequestError('name is required', 'name');
        }
        const response = new GreetingResponse();
        response.message = `Hello, ${request.name}`;
        response.requestId = RequestContext.getHeader(CoreHeaders.REQUEST_ID) ?? '';
        response.requestUrl = RequestContext.get(ServerContextKeys.REQUEST_URL) ?? '';
        return response;
    }

    async home(request: GreetingRequest): Promise<HtmlResult> {
        return new HtmlResult(`<h1>Welcome, ${request.name ?? 'guest'}</h1>`);
    }
}

class TestFilterRoutes implements Routes {
    configure(routeBuilder: RouteBuilder): void {
        routeBuilder.addFilter(new FilterDefinition(2000, ContextFilter, '*'));
        routeBuilder.addFilter(new FilterDefinition(1800, LogApiFilter, '*'));
    }
}

class TestMeta implements WebAppMeta {
    getDIModules(): ContainerModule[] {
        return [
            new ContainerModule((options) => {
                options.bind<string>(GREETING_PREFIX).toConstantValue('Hello');
            }),
        ];
    }

    getRoutes(): Routes[] {
        return [new TestFilterRoutes(), new RESTApiRoutes(GreetingApiPrototype, GreetingController)];
    }
}

describe('WebServer in test mode', () => {
    it('should run the filter chain and controller without HTTP', async () => {
        const server = await WebServerFactory.create(new TestMeta(), new ServerConfig(0));
        const api = server.createApiClient(GreetingApiPrototype);

        const response = await RequestContext.run(() => api.greet({ name: 'Ada' }));

        expect(response.message).toBe('Hello, Ada');
        expect(response.requestId).toMatch(/^svrGenReqId-\d+-[a-z0-9]+$/);
        expect(response.requestUrl).toBe('/greeting');
    });

    it('should keep a request id that is already in context', async () => {
        const server = await WebServerFactory.create(new TestMeta(), new ServerConfig(0));
        const api = server.createApiClient(GreetingApiPrototype);

        const response = await RequestContext.run(() => {
            RequestContext.putHeader(CoreHeaders.REQUEST_ID, 'req-from-test');
            return api.greet({ name: 'Ada' });
        });

        expect(response.requestId).toBe('req-from-test');
    });

    it('should propagate controller errors to the caller', async () => {
        const server = await WebServerFactory.create(new TestMeta(), new ServerConfig(0));
        const api = server.createApiClient(GreetingApiPrototype);

        await expect(RequestContext.run(() => api.greet({}))).rejects.toBeInstanceOf(HttpBadRequestError);
    });

    it('should return action results as they are', async () => {
        const server = await WebServerFactory.create(new TestMeta(), new ServerConfig(0));
        const api = server.createApiClient(GreetingApiPrototype);

        const result = await RequestContext.run(() => api.home({ name: 'Ada' }));

        expect(result).toEqual(new HtmlResult('<h1>Welcome, Ada</h1>', 200));
    });

    it('should refuse calls outside RequestContext', async () => {
        const server = await WebServerFactory.create(new TestMeta(), new ServerConfig(0));
        const api = server.createApiClient(GreetingApiPrototype);

        await expect(api.greet({ name: 'Ada' })).rejects.toThrow(
            'RequestContext not active for GreetingController.greet()',
        );
    });

    it('should expose the application container and its bindings', async () => {
        const server = await WebServerFactory.create(new TestMeta(), new ServerConfig(0));
        const container = server.getContainer();

        expect(container.get<string>(GREETING_PREFIX)).toBe('Hello');
        expect(container.get(SERVER_TYPES.AppContainer)).toBe(container);
    });
});
