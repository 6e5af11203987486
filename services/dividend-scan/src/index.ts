/**
 * 배당 스크리너 CLI
 * - 플래그 없음, 설정은 환경변수(.env)로만 조정
 * - 스캔 구간: 어제 ~ 10영업일 뒤
 * - 결과: 콘솔 표 + screener.csv
 */

import '@divscan/shared-utils/env-loader';
import { createLogger } from '@divscan/shared-utils';
import { loadScreenerConfig, runDividendScreener } from '@divscan/stock-screener';

const logger = createLogger('dividend-scan');

async function main(): Promise<void> {
  const config = loadScreenerConfig();
  const result = await runDividendScreener({ config });

  logger.info('dividend-scan 종료', {
    window: result.window,
    passedCount: result.passedCount,
    outputPath: config.outputPath,
  });
}

main().catch((error) => {
  logger.error('dividend-scan 실행 실패', error);
  process.exit(1);
});
