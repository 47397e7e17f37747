import { program } from 'commander';
import { VERSION, createTGA, getLogger, openTGA } from '@/index';
import { invertImage } from './transforms';

const logger = getLogger('invert-image');

program
	.name('invert-image')
	.description('Invert the colors of a TGA image.')
	.version(VERSION)
	.argument('<input>', 'TGA image to read')
	.argument('<output>', 'TGA image to write, with the same layout as the input')
	.action((inputPath: string, outputPath: string) => {
		try {
			const input = openTGA(inputPath);

			try {
				const output = createTGA(outputPath, input.spec());

				try {
					invertImage(input, output);
				} finally {
					output.close();
				}
			} finally {
				input.close();
			}

			logger.success(`Output written to ${outputPath}`);
		} catch (error) {
			logger.error(`Inverting ${inputPath} failed: ${error instanceof Error ? error.message : String(error)}`);
			process.exitCode = 1;
		}
	});

program.parse(process.argv);
