/**
 * Strategy Capability Interface
 *
 * SOLID 원칙:
 * - SRP: 하나의 동작 계약만 정의
 * - ISP: apply 하나만 노출
 * - DIP: Dispatcher/Registry는 구체 전략이 아닌 이 인터페이스에 의존
 *
 * 목적:
 * - 교체 가능한 전략들의 공통 계약
 * - 호출자는 어떤 구현을 들고 있는지 확인하지 않음
 */

/**
 * Strategy Interface (제네릭)
 * - TInput: 입력 도메인 값 타입 (예: 주문 금액)
 * - TOutput: 출력 도메인 값 타입 (예: 할인 금액). 비동기 전략은 Promise 반환
 */
export interface IStrategy<TInput, TOutput> {
  /**
   * 전략 타입 식별자
   */
  readonly type: string;

  /**
   * 전략 이름 (로깅/디버깅용)
   */
  readonly name: string;

  /**
   * 전략 적용
   * @throws InvalidInputError 입력값이 허용 범위를 벗어난 경우
   */
  apply(input: TInput): TOutput;
}

