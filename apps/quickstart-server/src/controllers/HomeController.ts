import { inject } from 'inversify';
import { HtmlResult } from '@oidc-quickstart/http-api';
import { Controller, provideSingleton, SourceFile, ValidateImplementation } from '@oidc-quickstart/http-routing';
import { HomeApi, HomeApiPrototype } from '../api/PageApi';
import { ComponentRenderer } from '../ui/ComponentRenderer';
import { IndexPage } from '../ui/pages/IndexPage';

@SourceFile('src/controllers/HomeController.ts')
@provideSingleton()
@Controller()
export class HomeController extends HomeApiPrototype implements HomeApi {
    private readonly __validator!: ValidateImplementation<HomeController, HomeApi>;

    constructor(@inject(ComponentRenderer) private renderer: ComponentRenderer) {
        super();
    }

    override async index(): Promise<HtmlResult> {
        return this.renderer.renderPage(IndexPage);
    }
}
