import {
    ApiInterface,
    Get,
    IsoDateExpander,
    Param,
    Path,
    Post,
    RequestHeaders,
    ResponseType,
    Url,
} from '@declarest/http-api';

export class Item {
    id?: string;
    name?: string;
}

@ApiInterface({ headers: ['Accept: application/json'] })
export abstract class ItemApiPrototype {
    @Get()
    @Path('/items/{id}?name={name}')
    getItem(@Param('id') id: string, @Param('name') name?: string | null): Promise<Item> {
        throw new Error('Must be implemented');
    }

    @Post()
    @Path('/items')
    createItem(item?: Item): Promise<Item> {
        throw new Error('Must be implemented');
    }

    @Post()
    @Path('/login')
    login(@Param('username') username: string, @Param('password') password: string): Promise<void> {
        throw new Error('Must be implemented');
    }

    @Get()
    @Path('/status')
    @ResponseType(String)
    status(@Url() base?: string): Promise<string> {
        throw new Error('Must be implemented');
    }

    @Get()
    @Path('/days/{day}')
    @RequestHeaders('X-Day: {day}')
    day(@Param('day', IsoDateExpander) day: Date): Promise<void> {
        throw new Error('Must be implemented');
    }
}
