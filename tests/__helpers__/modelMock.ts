// Stand-in for a mongoose Model: every static the services call is a jest.fn.

export const MODEL_METHODS = [
  'find',
  'findOne',
  'findById',
  'findOneAndUpdate',
  'findByIdAndUpdate',
  'updateOne',
  'deleteOne',
  'create',
  'exists',
  'countDocuments',
  'aggregate',
] as const;

export type ModelMock = Record<(typeof MODEL_METHODS)[number], jest.Mock>;

export const createModelMock = (): ModelMock => ({
  find: jest.fn(),
  findOne: jest.fn(),
  findById: jest.fn(),
  findOneAndUpdate: jest.fn(),
  findByIdAndUpdate: jest.fn(),
  updateOne: jest.fn(),
  deleteOne: jest.fn(),
  create: jest.fn(),
  exists: jest.fn(),
  countDocuments: jest.fn(),
  aggregate: jest.fn(),
});

/** Module shape for `jest.mock(path, () => modelModule())` on a model file with a default export. */
export const modelModule = (extra: Record<string, unknown> = {}) => ({
  __esModule: true,
  ...extra,
  default: createModelMock(),
});

export interface ModelModule {
  default: ModelMock;
}
