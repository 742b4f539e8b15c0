import { Model } from 'mongoose';
import CompanyModel from './company.model';
import WholesalerModel from './wholesaler.model';
import ServiceProviderModel from './serviceProvider.model';
import { EntityKind, IBusinessEntity } from './businessEntity';
import {
  CompanySubscription,
  IEntitySubscription,
  ServiceProviderSubscription,
  WholesalerSubscription,
} from './entitySubscription.model';
import {
  CompanySubscriptionRequest,
  ISubscriptionRequest,
  ServiceProviderSubscriptionRequest,
  WholesalerSubscriptionRequest,
} from './subscriptionRequest.model';

export interface EntityModels {
  kind: EntityKind;
  label: string;
  entity: Model<IBusinessEntity>;
  subscription: Model<IEntitySubscription>;
  request: Model<ISubscriptionRequest>;
  /** Field on `users` that links the account to the entity. */
  userLink: 'companyId' | 'wholesalerId' | 'serviceProviderId';
}

const registry: Record<EntityKind, EntityModels> = {
  company: {
    kind: 'company',
    label: 'Company',
    entity: CompanyModel,
    subscription: CompanySubscription,
    request: CompanySubscriptionRequest,
    userLink: 'companyId',
  },
  wholesaler: {
    kind: 'wholesaler',
    label: 'Wholesaler',
    entity: WholesalerModel,
    subscription: WholesalerSubscription,
    request: WholesalerSubscriptionRequest,
    userLink: 'wholesalerId',
  },
  serviceProvider: {
    kind: 'serviceProvider',
    label: 'Service provider',
    entity: ServiceProviderModel,
    subscription: ServiceProviderSubscription,
    request: ServiceProviderSubscriptionRequest,
    userLink: 'serviceProviderId',
  },
};

export const getEntityModels = (kind: EntityKind): EntityModels => registry[kind];
