import type { CompositeState } from '@/domain/stack/compositeState';

export interface NotifierPort {
  notifyStackStateChanged: (stackId: string, state: CompositeState) => void;
}
