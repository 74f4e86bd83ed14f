/** Maps items through `task` with at most `limit` tasks in flight; results keep input order. */
export async function mapWithLimit<T, R>(
	items: readonly T[],
	limit: number | undefined,
	task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	const results: R[] = new Array<R>(items.length);
	const width = limit && limit > 0 ? Math.min(limit, items.length) : items.length;
	let next = 0;

	const worker = async (): Promise<void> => {
		while (next < items.length) {
			const index = next;
			next += 1;
			results[index] = await task(items[index], index);
		}
	};

	await Promise.all(Array.from({ length: width }, () => worker()));
	return results;
}
