import type { AutomationProbe, ConditionSpec } from '../types/index.js';
import type { Condition } from '../wait/condition.js';
import { and, not, or } from '../wait/combinators.js';
import {
  attributeToBe,
  elementToBeClickable,
  invisibilityOfElementLocated,
  numberOfElementsToBe,
  presenceOfAllElementsLocated,
  presenceOfElementLocated,
  textToBePresentInElementLocated,
  titleContains,
  titleIs,
  urlContains,
  urlMatches,
  visibilityOfElementLocated,
} from '../conditions/expected.js';

export function buildCondition(spec: ConditionSpec): Condition<AutomationProbe, unknown> {
  switch (spec.kind) {
    case 'titleIs':
      return titleIs(spec.value);
    case 'titleContains':
      return titleContains(spec.value);
    case 'urlContains':
      return urlContains(spec.value);
    case 'urlMatches':
      return urlMatches(spec.pattern);
    case 'presenceOfElementLocated':
      return presenceOfElementLocated(spec.locator);
    case 'presenceOfAllElementsLocated':
      return presenceOfAllElementsLocated(spec.locator);
    case 'visibilityOfElementLocated':
      return visibilityOfElementLocated(spec.locator);
    case 'invisibilityOfElementLocated':
      return invisibilityOfElementLocated(spec.locator);
    case 'elementToBeClickable':
      return elementToBeClickable(spec.locator);
    case 'textToBePresentInElementLocated':
      return textToBePresentInElementLocated(spec.locator, spec.text);
    case 'numberOfElementsToBe':
      return numberOfElementsToBe(spec.locator, spec.count);
    case 'attributeToBe':
      return attributeToBe(spec.locator, spec.attribute, spec.value);
    case 'and':
      return and(...spec.conditions.map(buildCondition));
    case 'or':
      return or(...spec.conditions.map(buildCondition));
    case 'not':
      return not(buildCondition(spec.condition));
  }
}
