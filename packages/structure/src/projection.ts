/**
 * Boolean view of a zone list: the anchor index of every zone is true.
 */
export const projectZones = (
	zones: ReadonlyArray<{ index: number }>,
	length: number
): boolean[] => {
	const flags = new Array<boolean>(length).fill(false);
	for (const zone of zones) {
		flags[zone.index] = true;
	}
	return flags;
};
