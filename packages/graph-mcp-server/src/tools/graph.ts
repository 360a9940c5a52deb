import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  createAsset,
  createRegulatoryEvent,
  generateNetworkReport,
  type AssetInput,
  type GraphGuard,
  type GraphRepository,
} from '@asset-graph/core';
import {
  AddAssetSchema,
  AddEquityNodeSchema,
  AddRegulatoryEventSchema,
  AssetRelationshipsSchema,
  EmptySchema,
  FormulaicAnalysisSchema,
  NetworkReportSchema,
  VisualizationSceneSchema,
  type AddAssetParams,
} from '../schemas/graph.js';
import { errorResponse, textResponse, wrapResponse, type ToolResponse } from '../formatters/response.js';

export interface GraphToolContext {
  guard: GraphGuard;
  repository: GraphRepository | null;
}

type Handler = (params: unknown) => Promise<ToolResponse>;

function toAssetInput(p: AddAssetParams): AssetInput {
  const base = {
    id: p.id,
    symbol: p.symbol,
    name: p.name,
    sector: p.sector,
    price: p.price,
    marketCap: p.market_cap,
    currency: p.currency,
  };
  switch (p.asset_class) {
    case 'equity':
      return {
        ...base,
        assetClass: 'equity',
        peRatio: p.pe_ratio,
        dividendYield: p.dividend_yield,
        earningsPerShare: p.earnings_per_share,
        bookValue: p.book_value,
      };
    case 'fixed_income':
      return {
        ...base,
        assetClass: 'fixed_income',
        yieldToMaturity: p.yield_to_maturity,
        couponRate: p.coupon_rate,
        maturityDate: p.maturity_date,
        creditRating: p.credit_rating,
        issuerId: p.issuer_id,
      };
    case 'commodity':
      return {
        ...base,
        assetClass: 'commodity',
        contractSize: p.contract_size,
        deliveryDate: p.delivery_date,
        volatility: p.volatility,
      };
    case 'currency':
      return {
        ...base,
        assetClass: 'currency',
        exchangeRate: p.exchange_rate,
        country: p.country,
        centralBankRate: p.central_bank_rate,
      };
  }
}

/** Wrap a handler so every failure is reported as a tool result. */
function guarded(fn: (params: unknown) => Promise<ToolResponse>): Handler {
  return async (params) => {
    try {
      return await fn(params);
    } catch (err) {
      return errorResponse(err);
    }
  };
}

/**
 * Tool handlers bound to one guarded graph. Exposed separately from
 * registration so they can be exercised without a transport.
 */
export function createGraphToolHandlers(ctx: GraphToolContext) {
  const { guard } = ctx;

  return {
    add_equity_node: guarded(async (params) => {
      // numeric fields coerce in the schema; ids and symbols stay strings
      const p = AddEquityNodeSchema.parse(params);
      const equity = createAsset({
        id: p.asset_id,
        symbol: p.symbol,
        name: p.name,
        assetClass: 'equity',
        sector: p.sector,
        price: p.price,
      });
      await guard.addAsset(equity);
      return textResponse(`Successfully added: ${equity.name} (${equity.symbol})`);
    }),

    add_asset: guarded(async (params) => {
      const p = AddAssetSchema.parse(params);
      const asset = createAsset(toAssetInput(p));
      await guard.addAsset(asset);
      return textResponse(`Successfully added: ${asset.name} (${asset.symbol}) as ${asset.assetClass}`);
    }),

    add_regulatory_event: guarded(async (params) => {
      // related asset ids stay strings even when they look numeric
      const raw = AddRegulatoryEventSchema.parse(params);
      const event = createRegulatoryEvent({
        id: raw.id,
        assetId: raw.asset_id,
        eventType: raw.event_type,
        date: raw.date,
        description: raw.description,
        impactScore: raw.impact_score,
        relatedAssets: raw.related_assets ?? [],
      });
      await guard.addRegulatoryEvent(event);
      return textResponse(`Successfully added event: ${event.id} (${event.eventType} on ${event.assetId})`);
    }),

    build_relationships: guarded(async (params) => {
      EmptySchema.parse(params ?? {});
      await guard.buildRelationships();
      return wrapResponse(await guard.summary());
    }),

    graph_metrics: guarded(async (params) => {
      EmptySchema.parse(params ?? {});
      return wrapResponse(await guard.calculateMetrics());
    }),

    formulaic_analysis: guarded(async (params) => {
      const { category } = FormulaicAnalysisSchema.parse(params ?? {});
      const analysis = await guard.analyzeFormulas();
      if (category === undefined) return wrapResponse(analysis);
      const formulas = analysis.formulas.filter(f => f.category === category);
      return wrapResponse({ ...analysis, formulas, formulaCount: formulas.length });
    }),

    asset_relationships: guarded(async (params) => {
      const { asset_id, direction = 'both' } = AssetRelationshipsSchema.parse(params);
      const relationships = await guard.getRelationships();
      const outgoing = (relationships.get(asset_id) ?? []).map(e => ({
        target: e.targetId,
        relationship_type: e.relationshipType,
        strength: e.strength,
      }));
      const incoming: { source: string; relationship_type: string; strength: number }[] = [];
      for (const [source, edges] of relationships) {
        for (const e of edges) {
          if (e.targetId === asset_id) {
            incoming.push({ source, relationship_type: e.relationshipType, strength: e.strength });
          }
        }
      }
      return wrapResponse({
        asset_id,
        ...(direction !== 'incoming' ? { outgoing } : {}),
        ...(direction !== 'outgoing' ? { incoming } : {}),
      });
    }),

    visualization_scene: guarded(async (params) => {
      const p = VisualizationSceneSchema.parse(params ?? {});
      const scene = await guard.getScene({
        dimension: p.dimension,
        layoutType: p.layout_type,
        showDirectionalArrows: p.show_arrows,
        relationshipFilters: p.relationship_filters,
      });
      return wrapResponse(scene);
    }),

    network_report: guarded(async (params) => {
      const p = NetworkReportSchema.parse(params ?? {});
      const metrics = await guard.calculateMetrics();
      return textResponse(generateNetworkReport(metrics, { title: p.title, includeRules: p.include_rules }));
    }),

    save_graph: guarded(async (params) => {
      EmptySchema.parse(params ?? {});
      if (!ctx.repository) {
        return {
          content: [{ type: 'text' as const, text: 'No repository configured; set ASSET_GRAPH_BACKEND to file or postgres' }],
          isError: true,
        };
      }
      await guard.save(ctx.repository);
      return wrapResponse({ saved: true, ...(await guard.summary()) });
    }),
  };
}

/** JSON body of the `graph://data/3d-layout` resource. */
export async function layoutResourceText(guard: GraphGuard): Promise<string> {
  const data = await guard.getVisualizationData();
  return JSON.stringify({
    asset_ids: data.assetIds,
    positions: data.positions,
    colors: data.colors,
    hover: data.hoverTexts,
    is_placeholder: data.isPlaceholder,
  });
}

export function registerGraphTools(server: McpServer, ctx: GraphToolContext) {
  const handlers = createGraphToolHandlers(ctx);

  server.tool(
    'add_equity_node',
    'Validate an equity and add it to the graph. Returns a confirmation, or "Validation Error: <message>" when a field is invalid (for example a non-positive price).',
    AddEquityNodeSchema.shape,
    handlers.add_equity_node,
  );

  server.tool(
    'add_asset',
    'Add an asset of any class (equity, fixed_income, commodity, currency) with its class-specific fields. Bonds with issuer_id link to their issuer on the next rebuild.',
    AddAssetSchema.shape,
    handlers.add_asset,
  );

  server.tool(
    'add_regulatory_event',
    'Record a regulatory or corporate event on an asset. Its impact propagates to the related assets as event_impact relationships on the next rebuild.',
    AddRegulatoryEventSchema.shape,
    handlers.add_regulatory_event,
  );

  server.tool(
    'build_relationships',
    'Rebuild every relationship from the current assets and events (same sector, corporate links, event impact). Returns asset, relationship and event counts.',
    EmptySchema.shape,
    handlers.build_relationships,
  );

  server.tool(
    'graph_metrics',
    'Network metrics: asset and relationship totals, average strength, density, type and asset class distributions, top relationships and the quality score.',
    EmptySchema.shape,
    handlers.graph_metrics,
  );

  server.tool(
    'formulaic_analysis',
    'Financial formulas that apply to the assets in the graph (valuation, income, risk, portfolio, currency and cross-asset), each with a worked example from the data, plus category counts and pair strengths.',
    FormulaicAnalysisSchema.shape,
    handlers.formulaic_analysis,
  );

  server.tool(
    'asset_relationships',
    'List the outgoing and incoming relationships of one asset.',
    AssetRelationshipsSchema.shape,
    handlers.asset_relationships,
  );

  server.tool(
    'visualization_scene',
    'Renderer-neutral scene of the graph: node trace, one edge trace per relationship type and direction, optional directional markers, and a title.',
    VisualizationSceneSchema.shape,
    handlers.visualization_scene,
  );

  server.tool(
    'network_report',
    'Markdown report of the network metrics with a connectivity recommendation.',
    NetworkReportSchema.shape,
    handlers.network_report,
  );

  server.tool(
    'save_graph',
    'Persist the current graph to the configured repository (JSON file or PostgreSQL).',
    EmptySchema.shape,
    handlers.save_graph,
  );

  server.resource(
    '3d-layout',
    'graph://data/3d-layout',
    { mimeType: 'application/json', description: 'Current 3D visualization data for spatial reasoning' },
    async (uri) => ({
      contents: [{ uri: uri.href, mimeType: 'application/json', text: await layoutResourceText(ctx.guard) }],
    }),
  );
}
