import { Construct } from '@aws-cdk/core';
import { IBucket } from '@aws-cdk/aws-s3';
import { Distribution, OriginAccessIdentity, PriceClass, ViewerProtocolPolicy, AllowedMethods, CachedMethods, CachePolicy } from '@aws-cdk/aws-cloudfront';
import { S3Origin } from '@aws-cdk/aws-cloudfront-origins';
import { PriceTier } from './context-helper';

export interface SiteCdnProps {
  source: IBucket,
  priceTier: PriceTier,
}

function toPriceClass (priceTier: PriceTier) {
  switch (priceTier) {
    case PriceTier.PriceClass100:
      return PriceClass.PRICE_CLASS_100;
    case PriceTier.PriceClass200:
      return PriceClass.PRICE_CLASS_200;
    case PriceTier.PriceClassAll:
      return PriceClass.PRICE_CLASS_ALL;
  }
}

export class SiteCdn extends Construct {

  readonly source: IBucket;
  readonly distribution: Distribution;

  constructor(scope: Construct, id: string, siteCdnProps: SiteCdnProps) {
    super(scope, id);
    this.source = siteCdnProps.source;
    const originAccessIdentity = new OriginAccessIdentity(this, 'OriginAccessIdentity', {
      comment: 'Access identity for S3 bucket',
    });
    const origin = new S3Origin(this.source, {
      originAccessIdentity,
    });
    this.distribution = new Distribution(this, 'Distribution', {
      defaultBehavior: {
        origin,
        viewerProtocolPolicy: ViewerProtocolPolicy.REDIRECT_TO_HTTPS,
        allowedMethods: AllowedMethods.ALLOW_GET_HEAD,
        cachedMethods: CachedMethods.CACHE_GET_HEAD,
        cachePolicy: CachePolicy.CACHING_OPTIMIZED,
      },
      defaultRootObject: 'index.html',
      priceClass: toPriceClass(siteCdnProps.priceTier),
    });
  }

}
