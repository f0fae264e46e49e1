import { container } from './Modules.container';
import { KeyValueModule } from '../cohort-module-kv/KeyValueModule';
import { ResultsModule } from '../cohort-module-results/ResultsModule';
import { WarehouseModule } from '../cohort-module-warehouse/WarehouseModule';

class ModulesImpl {
    get KeyValue() {
        return container.get(KeyValueModule);
    }
    get Results() {
        return container.get(ResultsModule);
    }
    get Warehouse() {
        return container.get(WarehouseModule);
    }
}

export const Modules = new ModulesImpl();
