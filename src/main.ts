import { parseArgs } from 'util';
import { createConfig, parseDrawingMode } from './config';
import { createScene } from './createScene';
import { FileSink } from './output';
import { RayTracer } from './rayTracer';

async function main() {
  let { values } = parseArgs({
    options: {
      width: { type: 'string', default: '1000' },
      height: { type: 'string', default: '1000' },
      mode: { type: 'string', default: 'samples' },
      samples: { type: 'string', default: '5' },
      depth: { type: 'string', default: '5' },
      workers: { type: 'string' },
      sequential: { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      out: { type: 'string', default: 'output.ppm' }
    }
  });

  let mode = values.mode ?? 'samples';
  let out = values.out ?? 'output.ppm';

  let config = createConfig({
    width: Number(values.width),
    height: Number(values.height),
    mode: parseDrawingMode(mode, Number(values.samples)),
    maxDepth: Number(values.depth)
  });

  let tracer = new RayTracer(config);
  for (let mesh of await createScene()) {
    tracer.addMesh(mesh);
  }
  console.log(`scene ready: ${tracer.world.getMeshes().length} meshes`);

  let sink = new FileSink(out);
  let start = performance.now();
  console.log(`rendering ${config.width}x${config.height} (${mode}) to ${out}`);

  try {
    if (values.sequential) {
      tracer.runSequential(sink);
    } else {
      await tracer.runParallel(sink, {
        workers: values.workers === undefined ? undefined : Number(values.workers),
        verbose: values.verbose
      });
    }
  } finally {
    sink.close();
  }

  console.log(`done in ${((performance.now() - start) / 1000).toFixed(2)}s`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
