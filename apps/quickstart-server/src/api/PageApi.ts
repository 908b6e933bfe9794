import { HtmlResult } from '@oidc-quickstart/http-api';
import { ApiInterface, Get, Path } from '@oidc-quickstart/http-routing';

/**
 * Server-rendered pages. Each lives on its own prototype because filters are
 * chosen per controller, and the profile and fetch-data controllers sit
 * behind the login gate.
 */

export interface HomeApi {
    index(): Promise<HtmlResult>;
}

@ApiInterface()
export abstract class HomeApiPrototype implements HomeApi {
    @Get()
    @Path('/')
    index(): Promise<HtmlResult> {
        throw new Error('Method index() must be implemented by subclass');
    }
}

export interface ProfileApi {
    profile(): Promise<HtmlResult>;
}

@ApiInterface()
export abstract class ProfileApiPrototype implements ProfileApi {
    @Get()
    @Path('/profile')
    profile(): Promise<HtmlResult> {
        throw new Error('Method profile() must be implemented by subclass');
    }
}

export interface FetchDataApi {
    fetchData(): Promise<HtmlResult>;
}

@ApiInterface()
export abstract class FetchDataApiPrototype implements FetchDataApi {
    @Get()
    @Path('/fetchdata')
    fetchData(): Promise<HtmlResult> {
        throw new Error('Method fetchData() must be implemented by subclass');
    }
}
