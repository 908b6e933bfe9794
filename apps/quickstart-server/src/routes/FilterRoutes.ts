import { AuthContextFilter, BearerTokenFilter, RequireAuthFilter } from '@oidc-quickstart/auth-oidc';
import { FilterDefinition, RouteBuilder, Routes } from '@oidc-quickstart/http-routing';
import { ContextFilter, LogApiFilter } from '@oidc-quickstart/http-server';

/**
 * Filters run highest priority first:
 * - 2000 ContextFilter: platform headers into RequestContext, request id
 * - 1900 AuthContextFilter: SDK session into AuthContext
 * - 1800 LogApiFilter: structured API logs, secured headers masked
 * - 1700 RequireAuthFilter: login gate for controllers under secure/
 * - 1700 BearerTokenFilter: bearer token gate for controllers under api/
 */
export class FilterRoutes implements Routes {
    configure(routeBuilder: RouteBuilder): void {
        routeBuilder.addFilter(new FilterDefinition(2000, ContextFilter, '*'));
        routeBuilder.addFilter(new FilterDefinition(1900, AuthContextFilter, '*'));
        routeBuilder.addFilter(new FilterDefinition(1800, LogApiFilter, '*'));

        routeBuilder.addFilter(new FilterDefinition(1700, RequireAuthFilter, 'src/controllers/secure/**/*.ts'));
        routeBuilder.addFilter(new FilterDefinition(1700, BearerTokenFilter, 'src/controllers/api/**/*.ts'));
    }
}
