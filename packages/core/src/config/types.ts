/**
 * attachkit 설정 타입
 */

export interface AttachkitConfig {
  /** register(api)를 export하는 플러그인 모듈 목록 */
  plugins: string[];
  /** 플러그인 이름 → priority 재정의 */
  priorities: Record<string, number>;
  /** 잘못된 명령 토큰을 오류로 처리 */
  strict: boolean;
  defaultDeliverer: string;
}

export interface LoadedConfig {
  config: AttachkitConfig;
  /** 설정 파일 경로 (기본값만 사용한 경우 undefined) */
  source?: string;
}

export const CONFIG_FILE_NAME = 'attachkit.yaml';
export const CONFIG_ENV = 'ATTACHKIT_CONFIG';
export const PLUGIN_PATH_ENV = 'ATTACHKIT_PLUGIN_PATH';
export const STRICT_ENV = 'ATTACHKIT_STRICT';

export function defaultConfig(): AttachkitConfig {
  return {
    plugins: [],
    priorities: {},
    strict: false,
    defaultDeliverer: 'openai',
  };
}
