import { probeAgentRag } from '../../probes/agent-rag';
import { runScript } from '../script';

runScript('RELEASE TEST 06: Agent RAG Probes', probeAgentRag);
