function envFlag(value: string | undefined): boolean {
	return value === '1' || value?.toLowerCase() === 'true';
}

export const config = {
	header: {
		length: 18, // * Fixed size of the TGA header, before the image ID
		imageType: 2 // * Uncompressed true-color. The only type created or accepted
	},
	logging: {
		verbose: envFlag(process.env.TARGA_ROWS_DEBUG)
	}
};
