/**
 * Get the value stored under `key`, computing and storing it on a miss.
 */
export function getOrCompute<K, V>(map: Map<K, V>, key: K, compute: (key: K) => V): V {
	const cached = map.get(key);
	if (cached !== undefined) return cached;

	const value = compute(key);
	map.set(key, value);
	return value;
}
