import { program } from 'commander';
import { VERSION, createTGA, getLogger, openTGA } from '@/index';
import { meanImage } from './transforms';
import type { TGAImage } from '@/index';

const logger = getLogger('mean-image');

program
	.name('mean-image')
	.description('Average several TGA images of the same size, e.g. to extract the background of an animation.')
	.version(VERSION)
	.argument('<output>', 'TGA image to write')
	.argument('<inputs...>', 'TGA images to average')
	.action((outputPath: string, inputPaths: string[]) => {
		const inputs: TGAImage[] = [];

		try {
			for (const inputPath of inputPaths) {
				inputs.push(openTGA(inputPath));
			}

			const [first] = inputs;

			logger.info(`Inputs: ${inputPaths.join(', ')}`);
			logger.info(`Output: ${outputPath}`);
			logger.info(`Dimensions: ${first.width}x${first.height}`);

			const output = createTGA(outputPath, { ...first.spec(), origin: 'UPPER_LEFT' });

			try {
				meanImage(inputs, output, (y, height) => logger.info(`Processing line ${y + 1} of ${height}`));
			} finally {
				output.close();
			}

			logger.success(`Output written to ${outputPath}`);
		} catch (error) {
			logger.error(`Averaging failed: ${error instanceof Error ? error.message : String(error)}`);
			process.exitCode = 1;
		} finally {
			for (const input of inputs) {
				input.close();
			}
		}
	});

program.parse(process.argv);
