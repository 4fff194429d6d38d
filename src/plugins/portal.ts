import { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import {
  PortalGatewayService,
  type PortalGatewayOptions,
} from "../services/portal-gateway.service";
import { DirectoryResolverService } from "../services/directory-resolver.service";
import {
  CaseSearchService,
  type DateDefaults,
} from "../services/case-search.service";

export interface PortalServices {
  gateway: PortalGatewayService;
  directory: DirectoryResolverService;
  caseSearch: CaseSearchService;
}

export interface PortalPluginOptions {
  gateway?: Partial<PortalGatewayOptions>;
  dateDefaults?: DateDefaults;
}

declare module "fastify" {
  interface FastifyInstance {
    portal: PortalServices;
  }
}

const portalPlugin: FastifyPluginAsync<PortalPluginOptions> = async (
  fastify,
  opts
) => {
  const gateway = new PortalGatewayService(opts.gateway);
  const directory = new DirectoryResolverService(gateway);
  const caseSearch = new CaseSearchService(
    directory,
    gateway,
    gateway.portalBaseUrl,
    opts.dateDefaults
  );

  fastify.decorate("portal", { gateway, directory, caseSearch });
};

export default fp(portalPlugin, {
  name: "portal",
});
