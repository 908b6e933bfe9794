import { inject } from 'inversify';
import { HtmlResult } from '@oidc-quickstart/http-api';
import { Controller, provideSingleton, SourceFile, ValidateImplementation } from '@oidc-quickstart/http-routing';
import { FetchDataApi, FetchDataApiPrototype } from '../../api/PageApi';
import { ComponentRenderer } from '../../ui/ComponentRenderer';
import { FetchDataPage } from '../../ui/pages/FetchDataPage';

@SourceFile('src/controllers/secure/FetchDataController.ts')
@provideSingleton()
@Controller()
export class FetchDataController extends FetchDataApiPrototype implements FetchDataApi {
    private readonly __validator!: ValidateImplementation<FetchDataController, FetchDataApi>;

    constructor(@inject(ComponentRenderer) private renderer: ComponentRenderer) {
        super();
    }

    override async fetchData(): Promise<HtmlResult> {
        return this.renderer.renderPage(FetchDataPage);
    }
}
