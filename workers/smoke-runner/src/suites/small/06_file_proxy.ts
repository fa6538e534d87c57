import { probeFileProxy } from '../../probes/file-proxy';
import { runScript } from '../script';

runScript('TEST 06: File Proxy', probeFileProxy);
