import { probeChatStream } from '../../probes/chat-stream';
import { runScript } from '../script';

runScript('TEST 05: Chat Stream', probeChatStream);
