import { probeChatNonStream } from '../../probes/chat-nonstream';
import { runScript } from '../script';

runScript('TEST 04: Chat Non-Stream', probeChatNonStream);
