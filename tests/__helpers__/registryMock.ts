import { ENTITY_KINDS, EntityKind } from '../../src/models/businessEntity';
import { createModelMock, ModelMock } from './modelMock';

export interface EntityModelsMock {
  kind: EntityKind;
  label: string;
  entity: ModelMock;
  subscription: ModelMock;
  request: ModelMock;
  userLink: 'companyId' | 'wholesalerId' | 'serviceProviderId';
}

const LABELS: Record<EntityKind, [string, EntityModelsMock['userLink']]> = {
  company: ['Company', 'companyId'],
  wholesaler: ['Wholesaler', 'wholesalerId'],
  serviceProvider: ['Service provider', 'serviceProviderId'],
};

/** Module shape for `jest.mock('src/models/registry', () => registryModule())`. */
export const registryModule = () => {
  const registry = Object.fromEntries(
    ENTITY_KINDS.map((kind) => [
      kind,
      {
        kind,
        label: LABELS[kind][0],
        entity: createModelMock(),
        subscription: createModelMock(),
        request: createModelMock(),
        userLink: LABELS[kind][1],
      },
    ]),
  );
  return {
    __esModule: true,
    registry,
    getEntityModels: (kind: EntityKind) => registry[kind],
  };
};

export interface RegistryModule {
  registry: Record<EntityKind, EntityModelsMock>;
}
