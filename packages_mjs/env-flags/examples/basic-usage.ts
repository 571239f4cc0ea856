/**
 * Basic usage of env-flags.
 *
 * With the prefix below, `port` reads SERVER_PORT and `apiKey` reads
 * SERVER_UPSTREAM_API_KEY; `profile` only comes from the command line.
 *
 *   SERVER_PORT=9000 SERVER_ORIGINS="a.test, b.test" <runner> examples/basic-usage.ts -verbose
 */
import { ErrorHandling, FlagSet } from '../src/index.js';

const flags = new FlagSet('server', { errorHandling: ErrorHandling.ExitOnError });

const port = flags.uint('port', 8080, 'Port to listen on');
const verbose = flags.bool('verbose', false, 'Log every request');
const timeout = flags.duration('readTimeout', 30_000, 'Read timeout, e.g. 45s or 1m30s');
const origins = flags.stringList('origins', '', 'Allowed CORS origins, comma separated');
const apiKey = flags.string('apiKey', '', 'Upstream API key', 'UPSTREAM_API_KEY');
const profile = flags.string('profile', 'default', 'Profile name (command line only)', '-');

flags.setPrefix('server');
const result = flags.parse(process.argv.slice(2));

if (result.success) {
    console.log('port:', port.value);
    console.log('verbose:', verbose.value);
    console.log('readTimeout (ms):', timeout.value);
    console.log('origins:', origins.value());
    console.log('apiKey set:', apiKey.value !== '');
    console.log('profile:', profile.value);
    console.log('positional:', result.args);

    flags.visit(flag => {
        console.log(`  ${flag.name} came from ${flag.source}`);
    });
}
