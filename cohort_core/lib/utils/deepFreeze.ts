export function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.values(value).forEach((entry) => deepFreeze(entry));
        Object.freeze(value);
    }
    return value;
}
