import { runCli } from './run';

runCli(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        console.error('Fatal error:', err);
        process.exitCode = 1;
    });
