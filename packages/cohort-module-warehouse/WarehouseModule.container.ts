import { container } from '../cohort-modules/Modules.container';
import { ColumnIdResolver } from './ColumnIdResolver';
import { WarehouseModule } from './WarehouseModule';

export function loadWarehouseModule() {
    container.bind('ColumnIdResolver').to(ColumnIdResolver).inSingletonScope();
    container.bind(WarehouseModule).toSelf().inSingletonScope();
}
