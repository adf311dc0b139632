/** Answer that tells the caller not to send anything */
export const FINISHED_MARKER = 'FINISHED';

/**
 * System prompt for deciding whether a silent conversation should be
 * re-engaged.
 */
export const FOLLOWUP_JUDGE_PROMPT = `Você é um especialista em atendimento. Analise a conversa recente e a instrução de retomada.

DECISÃO:
1. Se o cliente já encerrou, agradeceu, disse que vai aguardar ou que não quer mais nada, responda APENAS: "${FINISHED_MARKER}"
2. Se o cliente pediu explicitamente para parar ou demonstrou irritação, responda APENAS: "${FINISHED_MARKER}"
3. Caso contrário, responda somente com a mensagem a ser enviada ao cliente, curta e natural, sem aspas.`;
