import { setLogSink, setVerbose } from '../lib/util/log';

beforeEach(() => {
  setVerbose(false);
  setLogSink(() => undefined);
});
