import { inject } from 'inversify';
import { AuthContext, ClaimTypes } from '@oidc-quickstart/auth-api';
import { HtmlResult } from '@oidc-quickstart/http-api';
import { Controller, provideSingleton, SourceFile, ValidateImplementation } from '@oidc-quickstart/http-routing';
import { ProfileApi, ProfileApiPrototype } from '../../api/PageApi';
import { ComponentRenderer } from '../../ui/ComponentRenderer';
import { ProfilePage, UserProfile } from '../../ui/pages/ProfilePage';

@SourceFile('src/controllers/secure/ProfileController.ts')
@provideSingleton()
@Controller()
export class ProfileController extends ProfileApiPrototype implements ProfileApi {
    private readonly __validator!: ValidateImplementation<ProfileController, ProfileApi>;

    constructor(@inject(ComponentRenderer) private renderer: ComponentRenderer) {
        super();
    }

    override async profile(): Promise<HtmlResult> {
        const principal = AuthContext.getPrincipal();
        const profile: UserProfile = {
            name: principal.name ?? '',
            email: principal.findFirstValue(ClaimTypes.EMAIL) ?? '',
            picture: principal.findFirstValue(ClaimTypes.PICTURE) ?? '',
        };

        return this.renderer.renderPage(ProfilePage, (page) => {
            page.profile = profile;
        });
    }
}
