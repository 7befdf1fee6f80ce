/**
 * prompt와 본문을 빈 줄로 이어 붙임 (앞뒤 공백 제거)
 */
export function combineText(prompt: string | null, text: string | null): string {
  return `${prompt ?? ''}\n\n${text ?? ''}`.trim();
}
