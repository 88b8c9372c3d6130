/**
 * 타임스탬프 유틸리티
 */

/**
 * 타임존 정보가 포함된 타임스탬프 생성
 * ISO 8601 형식 (예: 2025-10-30T12:34:56.789+09:00)
 *
 * - 시스템의 로컬 타임존 사용 (TZ 환경 변수)
 * - 밀리초 단위까지 기록
 */
export function getTimestampWithTimezone(date: Date = new Date()): string {
  const offset = -date.getTimezoneOffset();
  const offsetSign = offset >= 0 ? "+" : "-";
  const offsetHours = pad(Math.floor(Math.abs(offset) / 60));
  const offsetMinutes = pad(Math.abs(offset) % 60);

  const datePart = [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
  ].join("-");
  const timePart = [
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join(":");
  const millis = String(date.getMilliseconds()).padStart(3, "0");

  return `${datePart}T${timePart}.${millis}${offsetSign}${offsetHours}:${offsetMinutes}`;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}
