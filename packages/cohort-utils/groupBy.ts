// method has been borrowed from lodash

type PropertyName = string | number;

type ValueIteratee<T> = ((value: T) => PropertyName | null);

/**
 * Groups values by key, preserving insertion order. Values whose key is null are dropped.
 */
export const groupBy = <T>(collection: T[], iteratee: ValueIteratee<T>) =>
    collection.reduce<Map<PropertyName, T[]>>((result, value) => {
        const key = iteratee(value);
        if (key === null) {
            return result;
        }
        let group = result.get(key);
        if (!group) {
            group = [];
            result.set(key, group);
        }
        group.push(value);
        return result;
    }, new Map());
